import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProviderError } from '../../../common/errors/river-runner.errors';
import { chainScenario } from '../__fixtures__/segments';
import { GeoJsonSegmentProvider, isSegment } from './geojson-segment.provider';

const FIXTURE = path.join(__dirname, '..', '__fixtures__', 'flowlines.geojson');

describe('GeoJsonSegmentProvider', () => {
  const { seg1, seg2, seg3, seg4, seg5, seg6, collection } = chainScenario();
  const provider = new GeoJsonSegmentProvider(collection);

  it('returns features crossing a bounding box', async () => {
    const result = await provider.query({ bbox: [2.4, -0.1, 2.6, 0.1] });
    expect(result.features).toEqual([seg3]);
  });

  it('matches a point lying on a flowline', async () => {
    const result = await provider.query({ bbox: [2.5, 0, 2.5, 0] });
    expect(result.features).toEqual([seg3]);
  });

  it('combines property filters with OR', async () => {
    const result = await provider.query({
      properties: [
        { name: 'pathId', value: 20 },
        { name: 'sequence', value: 150 },
      ],
      combine: 'OR',
    });
    expect(result.features).toEqual([seg1, seg5, seg6]);
  });

  it('combines property filters with AND by default', async () => {
    const result = await provider.query({
      properties: [
        { name: 'pathId', value: 20 },
        { name: 'sequence', value: 600 },
      ],
    });
    expect(result.features).toEqual([seg6]);
  });

  it('sorts, offsets and limits', async () => {
    const result = await provider.query({
      sortBy: [{ property: 'sequence', order: 'ASC' }],
      offset: 1,
      limit: 3,
    });
    expect(result.features).toEqual([seg3, seg2, seg1]);
  });

  it('breaks sort ties by the next key', async () => {
    const result = await provider.query({
      sortBy: [
        { property: 'name', order: 'DESC' },
        { property: 'sequence', order: 'ASC' },
      ],
    });
    expect(result.features).toEqual([seg5, seg6, seg4, seg3, seg2, seg1]);
  });

  it('hands out the stored features without copying them', async () => {
    const result = await provider.query({});
    expect(result.features[0]).toBe(seg1);
    expect(result.features).not.toBe(collection.features);
  });

  it('rejects an unknown property', async () => {
    await expect(
      provider.query({ sortBy: [{ property: 'huc8', order: 'ASC' }] }),
    ).rejects.toThrow(ProviderError);
  });

  it('gets a feature by id', async () => {
    await expect(provider.get('seg4')).resolves.toBe(seg4);
    await expect(provider.get('nope')).resolves.toBeNull();
  });

  it('lists the attributes it knows', async () => {
    const fields = await provider.knownFields();
    expect([...fields].sort()).toEqual([
      'downstreamPathChain',
      'name',
      'nextPathId',
      'nextSequence',
      'pathId',
      'sequence',
    ]);
  });

  it('loads a FeatureCollection from disk', async () => {
    const fromFile = GeoJsonSegmentProvider.fromFile(FIXTURE);
    const seed = await fromFile.get('f-101');

    expect(seed?.properties.name).toBe('Fall Creek');
    expect((await fromFile.knownFields()).has('streamOrder')).toBe(true);
  });

  it('refuses a file that holds something else', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'river-runner-'));
    const file = path.join(dir, 'bad.geojson');
    fs.writeFileSync(
      file,
      JSON.stringify({
        type: 'FeatureCollection',
        features: [{ type: 'Feature', id: 'x', geometry: null, properties: {} }],
      }),
    );

    try {
      expect(() => GeoJsonSegmentProvider.fromFile(file)).toThrow(
        `${file}: feature 0 is not a valid flowline`,
      );
      expect(() =>
        GeoJsonSegmentProvider.fromFile(path.join(dir, 'missing.geojson')),
      ).toThrow(ProviderError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('GeoJsonSegmentProvider.fromFile', () => {
  it('refuses a downstream chain stored as a number', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'river-runner-'));
    const file = path.join(dir, 'numeric-chain.geojson');
    fs.writeFileSync(
      file,
      JSON.stringify({
        type: 'FeatureCollection',
        features: [
          {
            type: 'Feature',
            id: 'a',
            geometry: { type: 'LineString', coordinates: [[0, 0], [1, 0]] },
            properties: {
              pathId: 1,
              sequence: 10,
              nextPathId: 2,
              nextSequence: 5,
              downstreamPathChain: 2,
            },
          },
        ],
      }),
    );

    try {
      expect(() => GeoJsonSegmentProvider.fromFile(file)).toThrow(
        `${file}: feature 0 is not a valid flowline`,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('isSegment', () => {
  it('requires numeric pathId and sequence', () => {
    const { seg1 } = chainScenario();
    expect(isSegment(seg1)).toBe(true);
    expect(
      isSegment({ ...seg1, properties: { ...seg1.properties, pathId: '10' } }),
    ).toBe(false);
  });

  it('accepts only a string chain when one is present', () => {
    const { seg1, seg5 } = chainScenario();
    expect(isSegment(seg5)).toBe(true);
    expect(
      isSegment({
        ...seg1,
        properties: { ...seg1.properties, downstreamPathChain: null },
      }),
    ).toBe(true);
    expect(
      isSegment({
        ...seg1,
        properties: { ...seg1.properties, downstreamPathChain: 20 },
      }),
    ).toBe(false);
  });
});
