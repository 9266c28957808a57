import * as fs from 'fs';
import { bboxPolygon, booleanIntersects, point } from '@turf/turf';
import { ProviderError } from '../../../common/errors/river-runner.errors';
import {
  AttributeValue,
  Segment,
  SegmentCollection,
  SortSpec,
} from '../types/segment.interface';
import { SegmentProvider, SegmentQuery } from './segment-provider.interface';

const REQUIRED_FIELDS = [
  'pathId',
  'sequence',
  'nextPathId',
  'nextSequence',
  'downstreamPathChain',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === 'number';
}

function isChain(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

function isPosition(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((n) => typeof n === 'number')
  );
}

export function isSegment(value: unknown): value is Segment {
  if (!isRecord(value) || value.type !== 'Feature') return false;
  if (typeof value.id !== 'string' && typeof value.id !== 'number') {
    return false;
  }

  const geometry = value.geometry;
  if (
    !isRecord(geometry) ||
    geometry.type !== 'LineString' ||
    !Array.isArray(geometry.coordinates) ||
    !geometry.coordinates.every(isPosition)
  ) {
    return false;
  }

  const props = value.properties;
  return (
    isRecord(props) &&
    typeof props.pathId === 'number' &&
    typeof props.sequence === 'number' &&
    isNullableNumber(props.nextPathId ?? null) &&
    isNullableNumber(props.nextSequence ?? null) &&
    isChain(props.downstreamPathChain) &&
    Object.values(props).every(
      (v) => v === undefined || isAttributeValue(v),
    )
  );
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProviderError(`Cannot read ${filePath}: ${reason}`, {
      cause: error,
    });
  }
}

function compareValues(
  a: AttributeValue | undefined,
  b: AttributeValue | undefined,
): number {
  if (a === b) return 0;
  // null/undefined 는 항상 뒤로
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

function comparator(sortBy: SortSpec[]) {
  return (a: Segment, b: Segment): number => {
    for (const { property, order } of sortBy) {
      const result = compareValues(
        a.properties[property],
        b.properties[property],
      );
      if (result !== 0) return order === 'DESC' ? -result : result;
    }
    return 0;
  };
}

/**
 * In-memory flowline index over a GeoJSON FeatureCollection. Features are
 * handed out as-is and never modified.
 */
export class GeoJsonSegmentProvider implements SegmentProvider {
  private readonly fields: Set<string>;
  private readonly byId = new Map<string, Segment>();

  constructor(private readonly collection: SegmentCollection) {
    this.fields = new Set(REQUIRED_FIELDS);
    for (const feature of collection.features) {
      Object.keys(feature.properties).forEach((key) => this.fields.add(key));
      if (feature.id !== undefined) this.byId.set(String(feature.id), feature);
    }
  }

  static fromFile(filePath: string): GeoJsonSegmentProvider {
    const parsed = readJson(filePath);
    if (
      !isRecord(parsed) ||
      parsed.type !== 'FeatureCollection' ||
      !Array.isArray(parsed.features)
    ) {
      throw new ProviderError(`${filePath} is not a GeoJSON FeatureCollection`);
    }

    const features: Segment[] = [];
    const candidates: unknown[] = parsed.features;
    candidates.forEach((feature, index) => {
      if (!isSegment(feature)) {
        throw new ProviderError(
          `${filePath}: feature ${index} is not a valid flowline`,
        );
      }
      features.push(feature);
    });

    return new GeoJsonSegmentProvider({ type: 'FeatureCollection', features });
  }

  async knownFields(): Promise<Set<string>> {
    return new Set(this.fields);
  }

  async get(id: string | number): Promise<Segment | null> {
    return this.byId.get(String(id)) ?? null;
  }

  async query(query: SegmentQuery): Promise<SegmentCollection> {
    const filters = query.properties ?? [];
    const sortBy = query.sortBy ?? [];
    [...filters.map((f) => f.name), ...sortBy.map((s) => s.property)].forEach(
      (name) => {
        if (!this.fields.has(name)) {
          throw new ProviderError(`Unknown flowline property: ${name}`);
        }
      },
    );

    let features = this.collection.features;

    if (query.bbox) {
      const [minx, miny, maxx, maxy] = query.bbox;
      // lat/long 입력은 면적 없는 bbox 로 들어옴
      const area =
        minx === maxx && miny === maxy
          ? point([minx, miny])
          : bboxPolygon(query.bbox);
      features = features.filter((feature) =>
        booleanIntersects(area, feature),
      );
    }

    if (filters.length > 0) {
      const matches = (feature: Segment) =>
        query.combine === 'OR'
          ? filters.some((f) => feature.properties[f.name] === f.value)
          : filters.every((f) => feature.properties[f.name] === f.value);
      features = features.filter(matches);
    }

    if (sortBy.length > 0) {
      features = [...features].sort(comparator(sortBy));
    }

    const offset = query.offset ?? 0;
    const end = query.limit === undefined ? undefined : offset + query.limit;
    return { type: 'FeatureCollection', features: features.slice(offset, end) };
  }
}
