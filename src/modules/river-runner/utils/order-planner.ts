import { SortDirection, SortSpec } from '../types/segment.interface';

export const DEFAULT_SORT_PROPERTY = 'sequence';

/**
 * Turns a caller's sort intent into provider ordering.
 *
 * Grouping needs the members of a path to arrive contiguously in downstream
 * order, so a group-by request always gets `sequence DESC` whatever the
 * caller asked for. Groups then come out in that global order, so the path
 * holding the highest sequence values leads, not necessarily the seed path.
 * Without a direction the provider's default order applies.
 */
export function planOrder(
  direction: SortDirection | undefined,
  property: string = DEFAULT_SORT_PROPERTY,
  forceForGrouping = false,
): SortSpec[] {
  if (forceForGrouping) {
    return [{ property: DEFAULT_SORT_PROPERTY, order: 'DESC' }];
  }

  switch (direction) {
    case 'downstream':
      return [{ property, order: 'DESC' }];
    case 'upstream':
      return [{ property, order: 'ASC' }];
    default:
      return [];
  }
}
