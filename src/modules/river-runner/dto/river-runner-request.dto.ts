import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsLatitude,
  IsLongitude,
  IsNumber,
  IsOptional,
  IsString,
  ValidateIf,
} from 'class-validator';
import { SortDirection } from '../types/segment.interface';

/**
 * River Runner 실행 요청. 위치 입력(bbox, lat/long, coords, id) 중 하나만 허용
 */
export class RiverRunnerRequestDto {
  /** [minx, miny, maxx, maxy] (EPSG:4326) */
  @IsOptional()
  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4)
  @IsNumber({}, { each: true })
  bbox?: number[];

  @IsOptional()
  @IsNumber()
  @IsLatitude()
  lat?: number;

  @IsOptional()
  @IsNumber()
  @IsLongitude()
  long?: number;

  /** [lon, lat] */
  @IsOptional()
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  coords?: number[];

  /** Flowline id */
  @IsOptional()
  @ValidateIf((o: RiverRunnerRequestDto) => typeof o.id !== 'number')
  @IsString()
  id?: string | number;

  @IsOptional()
  @IsIn(['downstream', 'upstream'])
  sortDirection?: SortDirection;

  @IsOptional()
  @IsString()
  sortProperty?: string;

  /** 병합 기준 속성 이름 목록 */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  groupBy?: string[];
}
