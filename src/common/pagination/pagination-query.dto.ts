import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import * as classValidator from 'class-validator';
import { PaginationInfo } from './page';

const { IsInt, IsOptional, Max, Min } = classValidator;

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export class PaginationQueryDto {
  @ApiPropertyOptional({ example: 1, default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({
    example: DEFAULT_PAGE_SIZE,
    default: DEFAULT_PAGE_SIZE,
    minimum: 1,
    maximum: MAX_PAGE_SIZE,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  limit?: number;
}

export const toPaginationInfo = (query: PaginationQueryDto): PaginationInfo => ({
  page: query.page ?? 1,
  perPage: query.limit ?? DEFAULT_PAGE_SIZE,
});
