import { BoundingBox } from '../types/segment.interface';

function wrap(value: number, limit: number): number {
  const span = limit * 2;
  return ((((value + limit) % span) + span) % span) - limit;
}

/** Longitude into [-180, 180), wrapping across the antimeridian. */
export function wrapLongitude(lon: number): number {
  return wrap(lon, 180);
}

/** Latitude into [-90, 90), wrapping modularly like longitude. */
export function wrapLatitude(lat: number): number {
  return wrap(lat, 90);
}

export function pointToBoundingBox(lon: number, lat: number): BoundingBox {
  return [lon, lat, lon, lat];
}

/**
 * Grows every edge of the box by `delta` degrees, wraps both corners back
 * into range and rebuilds a well-formed box from their min/max.
 */
export function expandBoundingBox(
  box: BoundingBox,
  delta: number,
): BoundingBox {
  const [minx, miny, maxx, maxy] = box;
  const corners: Array<[number, number]> = [
    [wrapLongitude(minx - delta), wrapLatitude(miny - delta)],
    [wrapLongitude(maxx + delta), wrapLatitude(maxy + delta)],
  ];

  const xs = corners.map(([x]) => x);
  const ys = corners.map(([, y]) => y);

  return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];
}

export function isBoundingBox(value: readonly number[]): value is BoundingBox {
  return value.length === 4 && value.every((v) => Number.isFinite(v));
}
