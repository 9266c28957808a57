import {
  Feature,
  FeatureCollection,
  LineString,
  MultiLineString,
} from 'geojson';

export type AttributeValue = string | number | boolean | null;

/**
 * Attributes every flowline carries, plus whatever else the source passes
 * through (name, stream order, ...) for merge and output.
 */
export interface SegmentProperties {
  pathId: number;
  /** Decreases in the downstream direction within one path. */
  sequence: number;
  nextPathId: number | null;
  nextSequence: number | null;
  /** Comma-delimited pathIds from this segment's path to the outlet. */
  downstreamPathChain?: string | null;
  [attribute: string]: AttributeValue | undefined;
}

export type Segment = Feature<LineString, SegmentProperties>;

export type SegmentCollection = FeatureCollection<LineString, SegmentProperties>;

export type MergedProperties = Record<string, AttributeValue | undefined>;

export type MergedSegment = Feature<MultiLineString, MergedProperties>;

/** [minx, miny, maxx, maxy] */
export type BoundingBox = [number, number, number, number];

export interface TrimBoundary {
  pathId: number;
  threshold: number;
}

export type SortOrder = 'ASC' | 'DESC';

export interface SortSpec {
  property: string;
  order: SortOrder;
}

export type SortDirection = 'downstream' | 'upstream';
