import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import * as classValidator from 'class-validator';
import { PaginationQueryDto } from '../../common/pagination/pagination-query.dto';
import {
  GreaterThanOrEquals,
  ILike,
  InList,
  LessThanOrEquals,
  bindSortSpecifications,
  bindSpecifications,
  fieldBinder,
  sortTemplates,
} from '../../common/specification';
import { ToStringArray } from '../../common/utils/query-transforms';

const { IsNumber, IsOptional, IsString, IsUUID } = classValidator;

export class BuildingListQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  ids?: string[];

  @ApiPropertyOptional({ example: 'Ленина' })
  @IsOptional()
  @IsString()
  addressIlike?: string;

  @ApiPropertyOptional({ description: 'Широта не меньше' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  latitudeGe?: number;

  @ApiPropertyOptional({ description: 'Широта не больше' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  latitudeLe?: number;

  @ApiPropertyOptional({ description: 'Долгота не меньше' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  longitudeGe?: number;

  @ApiPropertyOptional({ description: 'Долгота не больше' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  longitudeLe?: number;

  @ApiPropertyOptional({ type: [String], example: ['address:asc'] })
  @IsOptional()
  @ToStringArray()
  @IsString({ each: true })
  sort?: string[];
}

const ID_IN = InList('id');
const ADDRESS_ILIKE = ILike('address');
const LATITUDE_GE = GreaterThanOrEquals('latitude');
const LATITUDE_LE = LessThanOrEquals('latitude');
const LONGITUDE_GE = GreaterThanOrEquals('longitude');
const LONGITUDE_LE = LessThanOrEquals('longitude');

const field = fieldBinder<BuildingListQueryDto>();

const BUILDING_FILTERS = [
  field('ids', (ids) => ID_IN.newWithValue(ids)),
  field('addressIlike', (address) => ADDRESS_ILIKE.newWithValue(address)),
  field('latitudeGe', (value) => LATITUDE_GE.newWithValue(value)),
  field('latitudeLe', (value) => LATITUDE_LE.newWithValue(value)),
  field('longitudeGe', (value) => LONGITUDE_GE.newWithValue(value)),
  field('longitudeLe', (value) => LONGITUDE_LE.newWithValue(value)),
];

const BUILDING_SORTS = sortTemplates({
  address: 'address',
  latitude: 'latitude',
  longitude: 'longitude',
});

export const toBuildingSpecifications = (query: BuildingListQueryDto) =>
  bindSpecifications(query, BUILDING_FILTERS);

export const toBuildingSortSpecifications = (query: BuildingListQueryDto) =>
  bindSortSpecifications(query.sort, BUILDING_SORTS);
