import { Inject, Injectable } from '@nestjs/common';
import { InvalidInputError } from '../../../common/errors/river-runner.errors';
import { LoggingUtil } from '../../../common/utils/logger.util';
import { EnvConfigService } from '../../../config/env-config.service';
import {
  SEGMENT_PROVIDER,
  SegmentProvider,
} from '../providers/segment-provider.interface';
import {
  Segment,
  SegmentCollection,
  SortSpec,
  TrimBoundary,
} from '../types/segment.interface';

export interface ParsedChain {
  pathIds: number[];
  /** Entries that were not integers. */
  rejected: string[];
}

export function parseDownstreamChain(chain: string): ParsedChain {
  const pathIds: number[] = [];
  const rejected: string[] = [];

  for (const raw of chain.split(',')) {
    const entry = raw.trim();
    if (entry === '') continue;
    if (/^-?\d+$/.test(entry)) {
      pathIds.push(Number(entry));
    } else {
      rejected.push(entry);
    }
  }
  return { pathIds, rejected };
}

/** Seed path first, then the chain, each path once. */
export function buildPathList(seed: Segment, chain: number[]): number[] {
  return [...new Set([seed.properties.pathId, ...chain])];
}

/**
 * Hand-off boundaries for a traced chain.
 *
 * The downstream-most member of each path (first seen on a sequence tie)
 * says where flow enters the next path; that becomes the next path's
 * threshold. The seed adds its own threshold so nothing upstream of the
 * starting point survives.
 */
export function deriveTrimBoundaries(
  seed: Segment,
  pathIds: number[],
  members: Segment[],
): TrimBoundary[] {
  const lowest = new Map<number, Segment>();
  for (const member of members) {
    const current = lowest.get(member.properties.pathId);
    if (!current || member.properties.sequence < current.properties.sequence) {
      lowest.set(member.properties.pathId, member);
    }
  }

  const boundaries: TrimBoundary[] = [];
  for (const pathId of pathIds) {
    const member = lowest.get(pathId);
    if (!member) continue;
    const { nextPathId, nextSequence } = member.properties;
    if (nextPathId === null || nextSequence === null) continue;
    boundaries.push({ pathId: nextPathId, threshold: nextSequence });
  }

  boundaries.push({
    pathId: seed.properties.pathId,
    threshold: seed.properties.sequence,
  });
  return boundaries;
}

export function isWithinBoundaries(
  segment: Segment,
  boundaries: TrimBoundary[],
): boolean {
  return boundaries.some(
    (b) =>
      segment.properties.pathId === b.pathId &&
      segment.properties.sequence <= b.threshold,
  );
}

/** Returns a new collection; `collection` itself is left untouched. */
export function applyTrimBoundaries(
  collection: SegmentCollection,
  boundaries: TrimBoundary[],
): SegmentCollection {
  return {
    ...collection,
    features: collection.features.filter((f) =>
      isWithinBoundaries(f, boundaries),
    ),
  };
}

@Injectable()
export class NetworkTracer {
  constructor(
    @Inject(SEGMENT_PROVIDER)
    private readonly provider: SegmentProvider,
    private readonly envConfigService: EnvConfigService,
    private readonly loggingUtil: LoggingUtil,
  ) {}

  async trace(seed: Segment, order: SortSpec[]): Promise<SegmentCollection> {
    const { end } = this.loggingUtil.startTimer('trace', 'TRACE');
    try {
      return await this.traceFrom(seed, order);
    } finally {
      end();
    }
  }

  private async traceFrom(
    seed: Segment,
    order: SortSpec[],
  ): Promise<SegmentCollection> {
    const chain = seed.properties.downstreamPathChain;
    if (typeof chain !== 'string') {
      throw new InvalidInputError(
        chain === undefined || chain === null
          ? `Flowline ${String(seed.id)} has no downstream path chain`
          : `Flowline ${String(seed.id)} has a malformed downstream path chain`,
      );
    }

    const { pathIds: downstream, rejected } = parseDownstreamChain(chain);
    for (const entry of rejected) {
      this.loggingUtil.logTrace(
        `Skipping unparseable path id "${entry}" in chain of ${String(seed.id)}`,
        'warn',
      );
    }

    const pathIds = buildPathList(seed, downstream);
    this.loggingUtil.logTrace(
      `Tracing ${pathIds.length} path(s) from ${String(seed.id)}: ${pathIds.join(',')}`,
    );

    const members = await this.provider.query({
      properties: pathIds.map((pathId) => ({ name: 'pathId', value: pathId })),
      combine: 'OR',
      sortBy: order,
      limit: this.envConfigService.traceMemberLimit,
    });

    if (members.features.length >= this.envConfigService.traceMemberLimit) {
      this.loggingUtil.logTrace(
        `Member query hit the limit of ${this.envConfigService.traceMemberLimit}; the traced path may be truncated`,
        'warn',
      );
    }

    const boundaries = deriveTrimBoundaries(seed, pathIds, members.features);
    const traced = applyTrimBoundaries(members, boundaries);

    this.loggingUtil.logTrace(
      `Kept ${traced.features.length} of ${members.features.length} flowlines across ${boundaries.length} boundaries`,
    );
    return traced;
  }
}
