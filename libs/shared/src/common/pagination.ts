import { OutOfRangeError } from '../domain/errors/domain.errors';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface PaginationOptions {
    page: number;
    pageSize: number;
}

export interface PagedResult<T> {
    items: T[];
    page: number;
    pageSize: number;
    totalCount: number;
    totalPages: number;
}

export function assertPagination(options: PaginationOptions): void {
    const { page, pageSize } = options;
    if (!Number.isInteger(page) || page < 1) {
        throw new OutOfRangeError('Page must be an integer greater than 0', 'page', page);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
        throw new OutOfRangeError(`Page size must be an integer between 1 and ${MAX_PAGE_SIZE}`, 'pageSize', pageSize);
    }
}

/** Slices one page out of a fully ordered sequence. */
export function paginate<T, R>(
    items: readonly T[],
    options: PaginationOptions,
    map: (item: T) => R
): PagedResult<R> {
    assertPagination(options);

    const { page, pageSize } = options;
    const start = (page - 1) * pageSize;
    const slice = items.slice(start, start + pageSize);

    return {
        items: slice.map(map),
        page,
        pageSize,
        totalCount: items.length,
        totalPages: Math.ceil(items.length / pageSize)
    };
}
