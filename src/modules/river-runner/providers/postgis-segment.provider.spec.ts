import { Flowline } from '../../../shared/entities/flowline.entity';
import { toSegment } from './postgis-segment.provider';

describe('toSegment', () => {
  it('maps a flowline row onto a GeoJSON feature', () => {
    const row = new Flowline();
    row.id = 'fl-7';
    row.geom = {
      type: 'LineString',
      coordinates: [
        [-86.2, 39.7],
        [-86.19, 39.69],
      ],
    };
    row.pathId = 7;
    row.sequence = 42.5;
    row.nextPathId = 8;
    row.nextSequence = 40;
    row.downstreamPathChain = '8,9';
    row.name = 'Fall Creek';
    row.streamOrder = 3;
    row.lengthKm = 1.25;

    expect(toSegment(row)).toEqual({
      type: 'Feature',
      id: 'fl-7',
      geometry: {
        type: 'LineString',
        coordinates: [
          [-86.2, 39.7],
          [-86.19, 39.69],
        ],
      },
      properties: {
        pathId: 7,
        sequence: 42.5,
        nextPathId: 8,
        nextSequence: 40,
        downstreamPathChain: '8,9',
        name: 'Fall Creek',
        streamOrder: 3,
        lengthKm: 1.25,
      },
    });
  });

  it('keeps missing hand-off values as null', () => {
    const row = new Flowline();
    row.id = 'outlet';
    row.geom = { type: 'LineString', coordinates: [[0, 0], [1, 0]] };
    row.pathId = 1;
    row.sequence = 1;
    row.nextPathId = null;
    row.nextSequence = null;
    row.downstreamPathChain = '';
    row.name = null;
    row.streamOrder = null;
    row.lengthKm = null;

    const segment = toSegment(row);
    expect(segment.properties.nextPathId).toBeNull();
    expect(segment.properties.nextSequence).toBeNull();
    expect(segment.properties.downstreamPathChain).toBe('');
  });
});
