import { Module } from '@nestjs/common';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CommonModule } from '../../common/common.module';
import { EnvConfigService } from '../../config/env-config.service';
import { Flowline } from '../../shared/entities/flowline.entity';
import { GeoJsonSegmentProvider } from './providers/geojson-segment.provider';
import { PostgisSegmentProvider } from './providers/postgis-segment.provider';
import {
  SEGMENT_PROVIDER,
  SegmentProvider,
} from './providers/segment-provider.interface';
import { RiverRunnerController } from './river-runner.controller';
import { RiverRunnerService } from './river-runner.service';
import { NetworkTracer } from './utils/network-tracer';
import { PathMerger } from './utils/path-merger';
import { SeedLocator } from './utils/seed-locator';

export function createSegmentProvider(
  envConfigService: EnvConfigService,
  flowlineRepository: Repository<Flowline>,
): SegmentProvider {
  if (
    envConfigService.segmentSource === 'geojson' &&
    envConfigService.segmentGeoJsonFile
  ) {
    return GeoJsonSegmentProvider.fromFile(envConfigService.segmentGeoJsonFile);
  }
  return new PostgisSegmentProvider(flowlineRepository);
}

@Module({
  imports: [TypeOrmModule.forFeature([Flowline]), CommonModule],
  providers: [
    {
      provide: SEGMENT_PROVIDER,
      useFactory: createSegmentProvider,
      inject: [EnvConfigService, getRepositoryToken(Flowline)],
    },
    SeedLocator,
    NetworkTracer,
    PathMerger,
    RiverRunnerService,
  ],
  controllers: [RiverRunnerController],
  exports: [RiverRunnerService],
})
export class RiverRunnerModule {}
