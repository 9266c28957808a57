import * as path from 'path';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { WinstonModule, WinstonModuleOptions } from 'nest-winston';
import { TypeOrmConfigService } from './config/typeorm.config';
import { winstonLoggerFactory } from './common/logger/logger.module';
import { EnvConfigService } from './config/env-config.service';
import { EnvConfigModule } from './config/env-config.module';
import { RiverRunnerModule } from './modules/river-runner/river-runner.module';

const envFilePath = path.resolve(
  process.cwd(),
  `.env.${process.env.NODE_ENV || 'local'}`,
);

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: [envFilePath],
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
    }),
    WinstonModule.forRootAsync({
      imports: [EnvConfigModule],
      useFactory: (envConfigService: EnvConfigService): WinstonModuleOptions =>
        winstonLoggerFactory(envConfigService),
      inject: [EnvConfigService],
    }),
    EnvConfigModule,
    RiverRunnerModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
