import {
  FeatureNotFoundError,
  InvalidInputError,
} from '../../../common/errors/river-runner.errors';
import {
  flowline,
  StubSegmentProvider,
  testEnvConfig,
  testLoggingUtil,
} from '../__fixtures__/segments';
import { BoundingBox } from '../types/segment.interface';
import { expandBoundingBox } from './bounding-box';
import {
  normalizeLocation,
  pickDownstreamMost,
  SeedLocator,
} from './seed-locator';

describe('normalizeLocation', () => {
  it('accepts a bounding box', () => {
    expect(normalizeLocation({ bbox: [-86.2, 39.7, -86.15, 39.75] })).toEqual({
      kind: 'bbox',
      bbox: [-86.2, 39.7, -86.15, 39.75],
    });
  });

  it('turns lat/long into a degenerate box ordered lon, lat', () => {
    expect(normalizeLocation({ latitude: 39.7, longitude: -86.2 })).toEqual({
      kind: 'bbox',
      bbox: [-86.2, 39.7, -86.2, 39.7],
    });
  });

  it('turns a coordinate pair into a degenerate box', () => {
    expect(normalizeLocation({ coordinates: [-86.2, 39.7] })).toEqual({
      kind: 'bbox',
      bbox: [-86.2, 39.7, -86.2, 39.7],
    });
  });

  it('accepts a feature id', () => {
    expect(normalizeLocation({ featureId: 'seg2' })).toEqual({
      kind: 'id',
      id: 'seg2',
    });
  });

  it('rejects an empty input', () => {
    expect(() => normalizeLocation({})).toThrow(InvalidInputError);
  });

  it('rejects more than one location form', () => {
    expect(() =>
      normalizeLocation({ bbox: [0, 0, 1, 1], featureId: 'seg2' }),
    ).toThrow(InvalidInputError);
    expect(() =>
      normalizeLocation({ latitude: 1, longitude: 2, coordinates: [2, 1] }),
    ).toThrow(InvalidInputError);
  });

  it('rejects a latitude without a longitude', () => {
    expect(() => normalizeLocation({ latitude: 39.7 })).toThrow(
      'lat and long must be given together',
    );
  });

  it('rejects lat/long that are not finite numbers', () => {
    expect(() => normalizeLocation({ latitude: NaN, longitude: 2.5 })).toThrow(
      'lat and long must be numbers',
    );
    expect(() =>
      normalizeLocation({ latitude: 0.01, longitude: Infinity }),
    ).toThrow(InvalidInputError);
  });

  it('rejects a malformed bbox', () => {
    expect(() => normalizeLocation({ bbox: [0, 0, 1] })).toThrow(
      InvalidInputError,
    );
  });
});

describe('pickDownstreamMost', () => {
  it('keeps the first of equally low sequences', () => {
    const a = flowline('a', 1, 50, [[0, 0], [1, 1]]);
    const b = flowline('b', 1, 40, [[0, 0], [1, 1]]);
    const c = flowline('c', 2, 40, [[0, 0], [1, 1]]);
    expect(pickDownstreamMost([a, b, c])).toBe(b);
    expect(pickDownstreamMost([])).toBeUndefined();
  });
});

describe('SeedLocator', () => {
  const box: BoundingBox = [-86.2, 39.7, -86.15, 39.75];
  const upstream = flowline('up', 7, 90, [[0, 0], [1, 1]]);
  const downstream = flowline('down', 7, 30, [[1, 1], [2, 2]]);

  it('selects the lowest sequence in the box', async () => {
    const provider = new StubSegmentProvider([[upstream, downstream]]);
    const locator = new SeedLocator(provider, testEnvConfig(), testLoggingUtil());

    await expect(locator.resolve({ bbox: box })).resolves.toBe(downstream);
    expect(provider.queries).toEqual([
      { bbox: box, sortBy: [{ property: 'sequence', order: 'ASC' }] },
    ]);
  });

  it('expands the box until something is found', async () => {
    const provider = new StubSegmentProvider([[], [], [upstream]]);
    const locator = new SeedLocator(provider, testEnvConfig(), testLoggingUtil());

    await expect(locator.locateByBoundingBox(box)).resolves.toBe(upstream);

    const once = expandBoundingBox(box, 0.025);
    const twice = expandBoundingBox(once, 0.025);
    expect(provider.queries.map((q) => q.bbox)).toEqual([box, once, twice]);
  });

  it('gives up after the configured number of attempts', async () => {
    const provider = new StubSegmentProvider([]);
    const locator = new SeedLocator(provider, testEnvConfig(), testLoggingUtil());

    await expect(locator.locateByBoundingBox(box)).rejects.toThrow(
      FeatureNotFoundError,
    );
    expect(provider.queries).toHaveLength(3);
  });

  it('reads attempts and delta from configuration', async () => {
    const provider = new StubSegmentProvider([]);
    const locator = new SeedLocator(
      provider,
      testEnvConfig({ SEED_MAX_ATTEMPTS: '5', SEED_SEARCH_DELTA: '0.5' }),
      testLoggingUtil(),
    );

    await expect(locator.locateByBoundingBox(box)).rejects.toThrow(
      FeatureNotFoundError,
    );
    expect(provider.queries).toHaveLength(5);
    expect(provider.queries[1].bbox).toEqual(expandBoundingBox(box, 0.5));
  });

  it('looks up a feature id directly', async () => {
    const provider = new StubSegmentProvider([], [upstream, downstream]);
    const locator = new SeedLocator(provider, testEnvConfig(), testLoggingUtil());

    await expect(locator.resolve({ featureId: 'down' })).resolves.toBe(
      downstream,
    );
    expect(provider.queries).toHaveLength(0);
  });

  it('fails when the feature id is unknown', async () => {
    const provider = new StubSegmentProvider([], [upstream]);
    const locator = new SeedLocator(provider, testEnvConfig(), testLoggingUtil());

    await expect(locator.resolve({ featureId: 'missing' })).rejects.toThrow(
      'Flowline missing not found',
    );
  });
});
