import { ApiPropertyOptional } from '@nestjs/swagger';
import * as classValidator from 'class-validator';
import { PaginationQueryDto } from '../../common/pagination/pagination-query.dto';
import {
  Equals,
  ILike,
  InList,
  bindSortSpecifications,
  bindSpecifications,
  fieldBinder,
  sortTemplates,
} from '../../common/specification';
import { ToStringArray } from '../../common/utils/query-transforms';

const { IsOptional, IsString, IsUUID, MaxLength } = classValidator;

export class ActivityListQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ type: [String], description: 'ID видов деятельности' })
  @IsOptional()
  @ToStringArray()
  @IsUUID('all', { each: true })
  ids?: string[];

  @ApiPropertyOptional({ description: 'ID родителя' })
  @IsOptional()
  @IsUUID()
  parentId?: string;

  @ApiPropertyOptional({ example: 'food', description: 'Поиск по вхождению без учета регистра' })
  @IsOptional()
  @IsString()
  @MaxLength(128)
  nameIlike?: string;

  @ApiPropertyOptional({ type: [String], example: ['name:asc'] })
  @IsOptional()
  @ToStringArray()
  @IsString({ each: true })
  sort?: string[];
}

const ID_IN = InList('id');
const PARENT_ID_EQUALS = Equals('parentId');
const NAME_ILIKE = ILike('name');

const field = fieldBinder<ActivityListQueryDto>();

const ACTIVITY_FILTERS = [
  field('ids', (ids) => ID_IN.newWithValue(ids)),
  field('parentId', (parentId) => PARENT_ID_EQUALS.newWithValue(parentId)),
  field('nameIlike', (name) => NAME_ILIKE.newWithValue(name)),
];

const ACTIVITY_SORTS = sortTemplates({ name: 'name', parentId: 'parentId' });

export const toActivitySpecifications = (query: ActivityListQueryDto) =>
  bindSpecifications(query, ACTIVITY_FILTERS);

export const toActivitySortSpecifications = (query: ActivityListQueryDto) =>
  bindSortSpecifications(query.sort, ACTIVITY_SORTS);
