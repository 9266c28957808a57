import { ConfigService } from '@nestjs/config';
import { Position } from 'geojson';
import { createLogger, Logger } from 'winston';
import { LoggingUtil } from '../../../common/utils/logger.util';
import { EnvConfigService } from '../../../config/env-config.service';
import {
  SegmentProvider,
  SegmentQuery,
} from '../providers/segment-provider.interface';
import {
  Segment,
  SegmentCollection,
  SegmentProperties,
} from '../types/segment.interface';

export const TEST_ENV: Record<string, string> = {
  DB_TYPE: 'postgres',
  DB_HOST: 'localhost',
  DB_PORT: '5432',
  DB_USERNAME: 'river',
  DB_DATABASE: 'hydro',
  DATABASE_SCHEMA: 'public',
  LOG_PATH: './logs',
};

export function testEnvConfig(
  overrides: Record<string, string> = {},
): EnvConfigService {
  return new EnvConfigService(new ConfigService({ ...TEST_ENV, ...overrides }));
}

export function silentLogger(): Logger {
  return createLogger({ silent: true });
}

export function testLoggingUtil(logger: Logger = silentLogger()): LoggingUtil {
  return new LoggingUtil(logger);
}

export function flowline(
  id: string,
  pathId: number,
  sequence: number,
  coordinates: Position[],
  extra: Partial<SegmentProperties> = {},
): Segment {
  return {
    type: 'Feature',
    id,
    geometry: { type: 'LineString', coordinates },
    properties: {
      pathId,
      sequence,
      nextPathId: null,
      nextSequence: null,
      downstreamPathChain: '',
      ...extra,
    },
  };
}

/**
 * Two paths. Path 10 flows into path 20 at sequence 500; seg6 lies upstream
 * of that hand-off on path 20.
 */
export function chainScenario() {
  const seg1 = flowline('seg1', 10, 150, [[0, 0], [1, 0]], {
    nextPathId: 10,
    nextSequence: 100,
    downstreamPathChain: '20',
    name: 'Mill Creek',
  });
  const seg2 = flowline('seg2', 10, 100, [[1, 0], [2, 0]], {
    nextPathId: 10,
    nextSequence: 80,
    downstreamPathChain: '20',
    name: 'Mill Creek',
  });
  const seg3 = flowline('seg3', 10, 80, [[2, 0], [3, 0]], {
    nextPathId: 10,
    nextSequence: 60,
    downstreamPathChain: '20',
    name: 'Mill Creek',
  });
  const seg4 = flowline('seg4', 10, 60, [[3, 0], [4, 0]], {
    nextPathId: 20,
    nextSequence: 500,
    downstreamPathChain: '20',
    name: 'Mill Creek',
  });
  const seg5 = flowline('seg5', 20, 500, [[4, 0], [5, 0]], {
    name: 'Stone River',
  });
  const seg6 = flowline('seg6', 20, 600, [[5, 2], [5, 1]], {
    nextPathId: 20,
    nextSequence: 500,
    name: 'Stone River',
  });

  const collection: SegmentCollection = {
    type: 'FeatureCollection',
    features: [seg1, seg2, seg3, seg4, seg5, seg6],
  };
  return { seg1, seg2, seg3, seg4, seg5, seg6, collection };
}

/** Answers queries from a scripted list and records what it was asked. */
export class StubSegmentProvider implements SegmentProvider {
  readonly queries: SegmentQuery[] = [];

  constructor(
    private readonly responses: Segment[][],
    private readonly segments: Segment[] = [],
    private readonly fields: Set<string> = new Set([
      'pathId',
      'sequence',
      'nextPathId',
      'nextSequence',
      'downstreamPathChain',
    ]),
  ) {}

  async query(query: SegmentQuery): Promise<SegmentCollection> {
    this.queries.push(query);
    const features = this.responses[this.queries.length - 1] ?? [];
    return { type: 'FeatureCollection', features };
  }

  async get(id: string | number): Promise<Segment | null> {
    return this.segments.find((s) => s.id === id) ?? null;
  }

  async knownFields(): Promise<Set<string>> {
    return new Set(this.fields);
  }
}
