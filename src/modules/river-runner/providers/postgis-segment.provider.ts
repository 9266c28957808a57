import { Brackets, Repository, SelectQueryBuilder } from 'typeorm';
import { ProviderError } from '../../../common/errors/river-runner.errors';
import { Flowline } from '../../../shared/entities/flowline.entity';
import { Segment, SegmentCollection } from '../types/segment.interface';
import { SegmentProvider, SegmentQuery } from './segment-provider.interface';

const ALIAS = 'flowline';

export function toSegment(row: Flowline): Segment {
  return {
    type: 'Feature',
    id: row.id,
    geometry: { type: 'LineString', coordinates: row.geom.coordinates },
    properties: {
      pathId: row.pathId,
      sequence: row.sequence,
      nextPathId: row.nextPathId,
      nextSequence: row.nextSequence,
      downstreamPathChain: row.downstreamPathChain,
      name: row.name,
      streamOrder: row.streamOrder,
      lengthKm: row.lengthKm,
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flowlines stored in PostGIS, read through the TypeORM repository.
 */
export class PostgisSegmentProvider implements SegmentProvider {
  constructor(private readonly repository: Repository<Flowline>) {}

  async knownFields(): Promise<Set<string>> {
    return new Set(this.attributeColumns());
  }

  async get(id: string | number): Promise<Segment | null> {
    try {
      const row = await this.repository.findOneBy({ id: String(id) });
      return row ? toSegment(row) : null;
    } catch (error) {
      throw new ProviderError(`Flowline lookup failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async query(query: SegmentQuery): Promise<SegmentCollection> {
    const qb = this.buildQuery(query);
    try {
      const rows = await qb.getMany();
      return { type: 'FeatureCollection', features: rows.map(toSegment) };
    } catch (error) {
      throw new ProviderError(`Flowline query failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  buildQuery(query: SegmentQuery): SelectQueryBuilder<Flowline> {
    const qb = this.repository.createQueryBuilder(ALIAS);

    if (query.bbox) {
      const [minx, miny, maxx, maxy] = query.bbox;
      qb.andWhere(
        `ST_Intersects(${ALIAS}.geom, ST_MakeEnvelope(:minx, :miny, :maxx, :maxy, 4326))`,
        { minx, miny, maxx, maxy },
      );
    }

    const filters = query.properties ?? [];
    if (filters.length > 0) {
      const combine = query.combine ?? 'AND';
      const clauses = filters.map((filter, i) => ({
        clause: `${ALIAS}.${this.column(filter.name)} = :p${i}`,
        params: { [`p${i}`]: filter.value },
      }));
      qb.andWhere(
        new Brackets((where) => {
          clauses.forEach(({ clause, params }) => {
            if (combine === 'OR') {
              where.orWhere(clause, params);
            } else {
              where.andWhere(clause, params);
            }
          });
        }),
      );
    }

    for (const sort of query.sortBy ?? []) {
      qb.addOrderBy(`${ALIAS}.${this.column(sort.property)}`, sort.order);
    }

    if (query.limit !== undefined) qb.limit(query.limit);
    if (query.offset !== undefined) qb.offset(query.offset);

    return qb;
  }

  private attributeColumns(): string[] {
    return this.repository.metadata.columns
      .map((column) => column.propertyName)
      .filter((name) => name !== 'id' && name !== 'geom');
  }

  // 컬럼 이름은 쿼리에 직접 들어가므로 엔티티에 있는 것만 허용
  private column(name: string): string {
    if (!this.attributeColumns().includes(name)) {
      throw new ProviderError(`Unknown flowline property: ${name}`);
    }
    return name;
  }
}
