import { Injectable } from '@nestjs/common';
import { multiLineString } from '@turf/turf';
import { LoggingUtil } from '../../../common/utils/logger.util';
import {
  AttributeValue,
  MergedProperties,
  MergedSegment,
  Segment,
} from '../types/segment.interface';

export interface GroupRange {
  /** inclusive */
  start: number;
  /** exclusive */
  end: number;
}

export type MergeResult =
  | { status: 'merged'; features: MergedSegment[] }
  | { status: 'skipped'; unknownFields: string[]; features: Segment[] };

function keyValues(
  feature: Segment,
  groupKeys: readonly string[],
): Array<AttributeValue | undefined> {
  return groupKeys.map((key) => feature.properties[key]);
}

function sameKeys(
  a: Array<AttributeValue | undefined>,
  b: Array<AttributeValue | undefined>,
): boolean {
  return a.every((value, i) => value === b[i]);
}

/**
 * Splits `features` into runs of equal group-key values. Only adjacent
 * features are compared, so two separate runs with the same keys stay two
 * groups.
 */
export function groupRanges(
  features: readonly Segment[],
  groupKeys: readonly string[],
): GroupRange[] {
  const ranges: GroupRange[] = [];
  let previous: Array<AttributeValue | undefined> | undefined;

  features.forEach((feature, index) => {
    const current = keyValues(feature, groupKeys);
    const last = ranges[ranges.length - 1];
    if (!last || !previous || !sameKeys(previous, current)) {
      ranges.push({ start: index, end: index + 1 });
    } else {
      last.end = index + 1;
    }
    previous = current;
  });

  return ranges;
}

export function mergeRange(
  features: readonly Segment[],
  range: GroupRange,
  groupKeys: readonly string[],
): MergedSegment {
  const members = features.slice(range.start, range.end);
  const properties: MergedProperties = {};
  groupKeys.forEach((key) => {
    properties[key] = members[0].properties[key];
  });

  return multiLineString(
    members.map((member) => member.geometry.coordinates),
    properties,
  );
}

@Injectable()
export class PathMerger {
  constructor(private readonly loggingUtil: LoggingUtil) {}

  /**
   * Merges contiguous same-key runs into MultiLineString features carrying
   * only the group keys. Input must already be ordered so that groups are
   * contiguous.
   */
  mergeByAttributes(
    features: readonly Segment[],
    groupKeys: readonly string[],
    knownFields: ReadonlySet<string>,
  ): MergeResult {
    const unknownFields = groupKeys.filter((key) => !knownFields.has(key));
    if (unknownFields.length > 0) {
      this.loggingUtil.logMerge(
        `Unknown group-by field(s) ${unknownFields.join(', ')}; returning ungrouped result`,
        'warn',
      );
      return { status: 'skipped', unknownFields, features: [...features] };
    }

    const ranges = groupRanges(features, groupKeys);
    this.loggingUtil.logMerge(
      `Merged ${features.length} flowlines into ${ranges.length} group(s) by ${groupKeys.join(', ')}`,
    );
    return {
      status: 'merged',
      features: ranges.map((range) => mergeRange(features, range, groupKeys)),
    };
  }
}
