export const RIVER_RUNNER_MIME_TYPE = 'application/geo+json';

/** GET /river-runner 로 노출되는 프로세스 설명 */
export const PROCESS_METADATA = {
  version: '0.1.0',
  id: 'river-runner',
  title: { en: 'River Runner' },
  description: {
    en:
      'Finds the flowline nearest to a location and follows it downstream ' +
      'to the outlet. Optionally merges consecutive flowlines that share ' +
      'the given attributes into multi-line features.',
  },
  keywords: ['river runner', 'rivers', 'flowline', 'hydrography'],
  inputs: {
    bbox: {
      title: 'Bounding Box',
      description: 'Four coordinates: [minx, miny, maxx, maxy]',
      schema: { type: 'array', items: { type: 'number' }, minItems: 4, maxItems: 4 },
      minOccurs: 0,
      maxOccurs: 1,
    },
    lat: {
      title: 'Latitude',
      description: 'Latitude of a point, given together with long',
      schema: { type: 'number' },
      minOccurs: 0,
      maxOccurs: 1,
    },
    long: {
      title: 'Longitude',
      description: 'Longitude of a point, given together with lat',
      schema: { type: 'number' },
      minOccurs: 0,
      maxOccurs: 1,
    },
    coords: {
      title: 'Coordinates',
      description: 'A [lon, lat] pair',
      schema: { type: 'array', items: { type: 'number' }, minItems: 2, maxItems: 2 },
      minOccurs: 0,
      maxOccurs: 1,
    },
    id: {
      title: 'Flowline id',
      description: 'Identifier of the starting flowline',
      schema: { type: 'string' },
      minOccurs: 0,
      maxOccurs: 1,
    },
    sortDirection: {
      title: 'Sort direction',
      description: 'downstream (sequence descending) or upstream',
      schema: { type: 'string', enum: ['downstream', 'upstream'] },
      minOccurs: 0,
      maxOccurs: 1,
    },
    sortProperty: {
      title: 'Sort property',
      description: 'Attribute to sort by, sequence when omitted',
      schema: { type: 'string' },
      minOccurs: 0,
      maxOccurs: 1,
    },
    groupBy: {
      title: 'Group by',
      description: 'Attributes whose consecutive equal values are merged',
      schema: { type: 'array', items: { type: 'string' } },
      minOccurs: 0,
      maxOccurs: 1,
    },
  },
  outputs: {
    path: {
      title: 'Feature Collection',
      description: 'GeoJSON FeatureCollection of the traced flow path',
      schema: { type: 'object', contentMediaType: RIVER_RUNNER_MIME_TYPE },
    },
  },
  example: {
    inputs: { bbox: [-86.2, 39.7, -86.15, 39.75] },
  },
} as const;
