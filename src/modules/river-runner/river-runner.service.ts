import { Inject, Injectable } from '@nestjs/common';
import { FeatureCollection, LineString, MultiLineString } from 'geojson';
import { LoggingUtil } from '../../common/utils/logger.util';
import { RiverRunnerRequestDto } from './dto/river-runner-request.dto';
import {
  SEGMENT_PROVIDER,
  SegmentProvider,
} from './providers/segment-provider.interface';
import { RIVER_RUNNER_MIME_TYPE } from './river-runner.constants';
import { NetworkTracer } from './utils/network-tracer';
import { planOrder } from './utils/order-planner';
import { PathMerger } from './utils/path-merger';
import { LocationInput, SeedLocator } from './utils/seed-locator';

export type RiverRunnerOutput = FeatureCollection<LineString | MultiLineString>;

export interface RiverRunnerResult {
  mimeType: string;
  value: RiverRunnerOutput;
}

export function toLocationInput(request: RiverRunnerRequestDto): LocationInput {
  return {
    bbox: request.bbox,
    latitude: request.lat,
    longitude: request.long,
    coordinates: request.coords,
    featureId: request.id,
  };
}

@Injectable()
export class RiverRunnerService {
  constructor(
    @Inject(SEGMENT_PROVIDER)
    private readonly provider: SegmentProvider,
    private readonly seedLocator: SeedLocator,
    private readonly networkTracer: NetworkTracer,
    private readonly pathMerger: PathMerger,
    private readonly loggingUtil: LoggingUtil,
  ) {}

  async execute(request: RiverRunnerRequestDto): Promise<RiverRunnerResult> {
    const { end } = this.loggingUtil.startTimer('execute', 'TRACE');
    try {
      return await this.run(request);
    } finally {
      end();
    }
  }

  private async run(request: RiverRunnerRequestDto): Promise<RiverRunnerResult> {
    const seed = await this.seedLocator.resolve(toLocationInput(request));

    const groupBy = request.groupBy ?? [];
    const order = planOrder(
      request.sortDirection,
      request.sortProperty,
      groupBy.length > 0,
    );
    const traced = await this.networkTracer.trace(seed, order);

    let value: RiverRunnerOutput = traced;
    if (groupBy.length > 0) {
      const knownFields = await this.provider.knownFields();
      const merged = this.pathMerger.mergeByAttributes(
        traced.features,
        groupBy,
        knownFields,
      );
      value = { type: 'FeatureCollection', features: merged.features };
    }

    return { mimeType: RIVER_RUNNER_MIME_TYPE, value };
  }
}
