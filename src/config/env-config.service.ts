import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  getEnvNumber,
  getRequiredEnvNumber,
  getRequiredEnvStr,
} from '../common/utils/get-required-env';

export type SegmentSource = 'postgis' | 'geojson';

@Injectable()
export class EnvConfigService {
  public readonly schema: string;
  public readonly logPath: string;

  public readonly dbType: string;
  public readonly dbHost: string;
  public readonly dbPort: number;
  public readonly dbUsername: string;
  public readonly dbDatabase: string;

  public readonly traceLog: string;
  public readonly traceErrorLog: string;

  public readonly seedMaxAttempts: number;
  public readonly seedSearchDelta: number;
  public readonly traceMemberLimit: number;

  public readonly segmentSource: SegmentSource;
  public readonly segmentGeoJsonFile: string | undefined;

  constructor(private config: ConfigService) {
    this.segmentSource = this.readSegmentSource();

    // Segment-Source
    if (this.segmentSource === 'geojson') {
      this.segmentGeoJsonFile = getRequiredEnvStr(
        this.config,
        'SEGMENT_GEOJSON_FILE',
      );
      this.dbType = this.config.get<string>('DB_TYPE', 'postgres');
      this.dbHost = this.config.get<string>('DB_HOST', '');
      this.dbPort = getEnvNumber(this.config, 'DB_PORT', 5432);
      this.dbUsername = this.config.get<string>('DB_USERNAME', '');
      this.dbDatabase = this.config.get<string>('DB_DATABASE', '');
      this.schema = this.config.get<string>('DATABASE_SCHEMA', 'public');
    } else {
      this.dbType = getRequiredEnvStr(this.config, 'DB_TYPE');
      this.dbHost = getRequiredEnvStr(this.config, 'DB_HOST');
      this.dbPort = getRequiredEnvNumber(this.config, 'DB_PORT');
      this.dbUsername = getRequiredEnvStr(this.config, 'DB_USERNAME');
      this.dbDatabase = getRequiredEnvStr(this.config, 'DB_DATABASE');
      this.schema = getRequiredEnvStr(this.config, 'DATABASE_SCHEMA');
    }

    this.logPath = getRequiredEnvStr(this.config, 'LOG_PATH');
    this.traceLog = this.config.get<string>('TRACE_LOG', 'trace.log');
    this.traceErrorLog = this.config.get<string>(
      'TRACE_ERROR_LOG',
      'trace-error.log',
    );

    //River-Runner
    this.seedMaxAttempts = getEnvNumber(this.config, 'SEED_MAX_ATTEMPTS', 3);
    this.seedSearchDelta = getEnvNumber(
      this.config,
      'SEED_SEARCH_DELTA',
      0.025,
    );
    this.traceMemberLimit = getEnvNumber(
      this.config,
      'TRACE_MEMBER_LIMIT',
      10000,
    );

    if (!Number.isInteger(this.seedMaxAttempts) || this.seedMaxAttempts < 1) {
      throw new Error('SEED_MAX_ATTEMPTS must be a positive integer');
    }
    if (
      !Number.isInteger(this.traceMemberLimit) ||
      this.traceMemberLimit < 1
    ) {
      throw new Error('TRACE_MEMBER_LIMIT must be a positive integer');
    }
  }

  private readSegmentSource(): SegmentSource {
    const source = this.config.get<string>('SEGMENT_SOURCE', 'postgis');
    if (source !== 'postgis' && source !== 'geojson') {
      throw new Error(`Unsupported SEGMENT_SOURCE: ${source}`);
    }
    return source;
  }
}
