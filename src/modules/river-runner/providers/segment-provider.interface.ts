import {
  AttributeValue,
  BoundingBox,
  Segment,
  SegmentCollection,
  SortSpec,
} from '../types/segment.interface';

export const SEGMENT_PROVIDER = Symbol('SEGMENT_PROVIDER');

export interface PropertyFilter {
  name: string;
  value: Exclude<AttributeValue, null>;
}

export interface SegmentQuery {
  bbox?: BoundingBox;
  properties?: PropertyFilter[];
  /** How property filters combine. Defaults to AND. */
  combine?: 'AND' | 'OR';
  sortBy?: SortSpec[];
  limit?: number;
  offset?: number;
}

/**
 * Read-only access to the drainage network. Implementations must not mutate
 * collections they have already handed out.
 */
export interface SegmentProvider {
  query(query: SegmentQuery): Promise<SegmentCollection>;
  get(id: string | number): Promise<Segment | null>;
  knownFields(): Promise<Set<string>>;
}
