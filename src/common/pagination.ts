import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export const DEFAULT_PAGE_SIZE = 20;
export const MIN_SEARCH_LENGTH = 3;

export type SortOrder = 'asc' | 'desc';

export class PageQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  page?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  page_size?: number;

  @IsString()
  @IsOptional()
  sort_by?: string;

  @IsIn(['asc', 'desc'])
  @IsOptional()
  sort_order?: SortOrder;
}

export class SearchQueryDto extends PageQueryDto {
  @IsString()
  q!: string;
}

export interface PageRequest<TSortField extends string> {
  page: number;
  pageSize: number;
  sortBy: TSortField;
  sortOrder: SortOrder;
}

export interface PageInfo {
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
}

/**
 * Normalizes raw paging query values. Sort fields outside `allowed` fall back
 * to `fallback`.
 */
export function toPageRequest<TSortField extends string>(
  query: PageQueryDto,
  allowed: readonly TSortField[],
  fallback: TSortField,
): PageRequest<TSortField> {
  const sortBy = allowed.find((field) => field === query.sort_by) ?? fallback;
  return {
    page: query.page ?? 1,
    pageSize: query.page_size ?? DEFAULT_PAGE_SIZE,
    sortBy,
    sortOrder: query.sort_order ?? 'desc',
  };
}

export function pageInfo(total: number, request: PageRequest<string>): PageInfo {
  return {
    total,
    page: request.page,
    page_size: request.pageSize,
    total_pages: Math.ceil(total / request.pageSize),
  };
}
