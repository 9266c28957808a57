import { Entity, PrimaryColumn, Column, Index, LineString } from 'typeorm';

/**
 * 하천 네트워크의 흐름선(reach) 한 구간
 */
@Entity('flowline')
export class Flowline {
  @PrimaryColumn({ type: 'varchar' })
  id!: string;

  @Index({ spatial: true })
  @Column('geometry', {
    spatialFeatureType: 'LineString',
    srid: 4326,
  })
  geom!: LineString;

  /** 같은 흐름 경로(level path)로 묶이는 구간들의 식별자 */
  @Index()
  @Column({ name: 'path_id', type: 'int' })
  pathId!: number;

  /** 하류로 갈수록 작아지는 정렬 값 */
  @Column({ type: 'double precision' })
  sequence!: number;

  @Column({ name: 'next_path_id', type: 'int', nullable: true })
  nextPathId!: number | null;

  @Column({ name: 'next_sequence', type: 'double precision', nullable: true })
  nextSequence!: number | null;

  /** 하구까지 이어지는 path_id 목록 (쉼표 구분) */
  @Column({ name: 'downstream_path_chain', type: 'text', nullable: true })
  downstreamPathChain!: string | null;

  @Column({ type: 'varchar', nullable: true })
  name!: string | null;

  @Column({ name: 'stream_order', type: 'int', nullable: true })
  streamOrder!: number | null;

  @Column({ name: 'length_km', type: 'double precision', nullable: true })
  lengthKm!: number | null;
}
