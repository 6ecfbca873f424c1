import { ApiPropertyOptional } from '@nestjs/swagger';
import * as classValidator from 'class-validator';
import { PaginationQueryDto } from '../../common/pagination/pagination-query.dto';
import {
  ILike,
  InList,
  QueryFilter,
  SubList,
  bindSortSpecifications,
  bindSpecifications,
  fieldBinder,
  sortTemplates,
} from '../../common/specification';
import { ToStringArray } from '../../common/utils/query-transforms';
import {
  ActivityIdInListFilter,
  ActivityIdInListWithChildrenFilter,
  CoordinateFilter,
} from '../filters/organization.filters';

const { IsOptional, IsString, IsUUID, MaxLength } = classValidator;

export class OrganizationListQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  ids?: string[];

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  buildingIds?: string[];

  @ApiPropertyOptional({ example: 'рога' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  nameIlike?: string;

  @ApiPropertyOptional({ type: [String], description: 'Все перечисленные номера есть у организации' })
  @IsOptional()
  @ToStringArray()
  @IsString({ each: true })
  phoneNumbers?: string[];

  @ApiPropertyOptional({ type: [String], description: 'Связана хотя бы с одним видом деятельности' })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  activityIds?: string[];

  @ApiPropertyOptional({
    type: [String],
    description: 'То же, что activityIds, включая все дочерние виды деятельности',
  })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  activityIdsWithChildren?: string[];

  @ApiPropertyOptional({ example: '55.70,37.50;55.80,37.70', description: 'minLat,minLon;maxLat,maxLon' })
  @IsOptional()
  @IsString()
  coords?: string;

  @ApiPropertyOptional({ type: [String], example: ['name:asc'] })
  @IsOptional()
  @ToStringArray()
  @IsString({ each: true })
  sort?: string[];
}

const ID_IN = InList('id');
const BUILDING_ID_IN = InList('buildingId');
const NAME_ILIKE = ILike('name');
const PHONE_NUMBERS_CONTAIN = SubList('phoneNumbers');

const field = fieldBinder<OrganizationListQueryDto>();

const ORGANIZATION_FILTERS = [
  field('ids', (ids) => ID_IN.newWithValue(ids)),
  field('buildingIds', (ids) => BUILDING_ID_IN.newWithValue(ids)),
  field('nameIlike', (name) => NAME_ILIKE.newWithValue(name)),
  field('phoneNumbers', (numbers) => PHONE_NUMBERS_CONTAIN.newWithValue(numbers)),
];

const ORGANIZATION_SORTS = sortTemplates({ name: 'name', buildingId: 'buildingId' });

export const toOrganizationSpecifications = (query: OrganizationListQueryDto) =>
  bindSpecifications(query, ORGANIZATION_FILTERS);

export const toOrganizationSortSpecifications = (query: OrganizationListQueryDto) =>
  bindSortSpecifications(query.sort, ORGANIZATION_SORTS);

export const toOrganizationFilters = (
  query: OrganizationListQueryDto,
): QueryFilter<unknown>[] => {
  const filters: QueryFilter<unknown>[] = [];

  if (query.activityIds) {
    filters.push(new ActivityIdInListFilter(query.activityIds));
  }
  if (query.activityIdsWithChildren) {
    filters.push(new ActivityIdInListWithChildrenFilter(query.activityIdsWithChildren));
  }
  if (query.coords) {
    filters.push(CoordinateFilter.fromString(query.coords));
  }
  return filters;
};
