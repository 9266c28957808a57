import { Inject, Injectable } from '@nestjs/common';
import {
  FeatureNotFoundError,
  InvalidInputError,
} from '../../../common/errors/river-runner.errors';
import { LoggingUtil } from '../../../common/utils/logger.util';
import { EnvConfigService } from '../../../config/env-config.service';
import {
  SEGMENT_PROVIDER,
  SegmentProvider,
} from '../providers/segment-provider.interface';
import { BoundingBox, Segment } from '../types/segment.interface';
import {
  expandBoundingBox,
  isBoundingBox,
  pointToBoundingBox,
} from './bounding-box';

export interface LocationInput {
  bbox?: number[];
  latitude?: number;
  longitude?: number;
  /** [lon, lat] */
  coordinates?: number[];
  featureId?: string | number;
}

export type SeedLocation =
  | { kind: 'bbox'; bbox: BoundingBox }
  | { kind: 'id'; id: string | number };

/**
 * Reduces the caller's location input to a single form. Exactly one of bbox,
 * latitude+longitude, coordinates or featureId must be given.
 */
export function normalizeLocation(input: LocationInput): SeedLocation {
  const forms: SeedLocation[] = [];

  if (input.bbox !== undefined) {
    if (!isBoundingBox(input.bbox)) {
      throw new InvalidInputError(
        'bbox must hold four numbers: [minx, miny, maxx, maxy]',
      );
    }
    forms.push({ kind: 'bbox', bbox: input.bbox });
  }

  const hasLat = input.latitude !== undefined;
  const hasLong = input.longitude !== undefined;
  if (hasLat !== hasLong) {
    throw new InvalidInputError('lat and long must be given together');
  }
  if (input.latitude !== undefined && input.longitude !== undefined) {
    if (!Number.isFinite(input.latitude) || !Number.isFinite(input.longitude)) {
      throw new InvalidInputError('lat and long must be numbers');
    }
    forms.push({
      kind: 'bbox',
      bbox: pointToBoundingBox(input.longitude, input.latitude),
    });
  }

  if (input.coordinates !== undefined) {
    const [lon, lat] = input.coordinates;
    if (
      input.coordinates.length !== 2 ||
      !Number.isFinite(lon) ||
      !Number.isFinite(lat)
    ) {
      throw new InvalidInputError('coords must be a [lon, lat] pair');
    }
    forms.push({ kind: 'bbox', bbox: pointToBoundingBox(lon, lat) });
  }

  if (input.featureId !== undefined && input.featureId !== '') {
    forms.push({ kind: 'id', id: input.featureId });
  }

  if (forms.length === 0) {
    throw new InvalidInputError('Cannot process without any location input');
  }
  if (forms.length > 1) {
    throw new InvalidInputError(
      'Provide only one of bbox, lat/long, coords or id',
    );
  }
  return forms[0];
}

/** First segment with the smallest sequence, i.e. closest to the outlet. */
export function pickDownstreamMost(features: Segment[]): Segment | undefined {
  let best: Segment | undefined;
  for (const feature of features) {
    if (!best || feature.properties.sequence < best.properties.sequence) {
      best = feature;
    }
  }
  return best;
}

@Injectable()
export class SeedLocator {
  constructor(
    @Inject(SEGMENT_PROVIDER)
    private readonly provider: SegmentProvider,
    private readonly envConfigService: EnvConfigService,
    private readonly loggingUtil: LoggingUtil,
  ) {}

  async resolve(input: LocationInput): Promise<Segment> {
    const location = normalizeLocation(input);
    return location.kind === 'id'
      ? this.locateById(location.id)
      : this.locateByBoundingBox(location.bbox);
  }

  async locateById(id: string | number): Promise<Segment> {
    const segment = await this.provider.get(id);
    if (!segment) {
      this.loggingUtil.logSeed(`No flowline with id ${id}`, 'warn');
      throw new FeatureNotFoundError(`Flowline ${id} not found`);
    }
    this.loggingUtil.logSeed(
      `Seed ${id} on path ${segment.properties.pathId}`,
    );
    return segment;
  }

  async locateByBoundingBox(
    box: BoundingBox,
    maxAttempts = this.envConfigService.seedMaxAttempts,
    delta = this.envConfigService.seedSearchDelta,
  ): Promise<Segment> {
    let searchBox = box;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const candidates = await this.provider.query({
        bbox: searchBox,
        sortBy: [{ property: 'sequence', order: 'ASC' }],
      });

      const seed = pickDownstreamMost(candidates.features);
      if (seed) {
        this.loggingUtil.logSeed(
          `Seed ${String(seed.id)} (path ${seed.properties.pathId}, sequence ${seed.properties.sequence}) found on attempt ${attempt}`,
        );
        return seed;
      }

      if (attempt < maxAttempts) {
        searchBox = expandBoundingBox(searchBox, delta);
        this.loggingUtil.logSeed(
          `No flowline in bbox, expanding to [${searchBox.join(', ')}]`,
        );
      }
    }

    this.loggingUtil.logSeed(
      `No flowline within ${maxAttempts} attempts around [${box.join(', ')}]`,
      'warn',
    );
    throw new FeatureNotFoundError(
      `No flowline found near [${box.join(', ')}]`,
    );
  }
}
