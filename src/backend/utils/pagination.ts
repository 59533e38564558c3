import { PaginationInfo } from '../../shared/types';

export interface Page<T> {
  items: T[];
  pagination: PaginationInfo;
}

/**
 * Slices one 1-indexed page out of `items`. Page k holds the items at
 * offsets [(k - 1) * perPage, min(k * perPage, total)); pages past the end
 * are empty.
 */
export function paginate<T>(items: T[], page: number, perPage: number): Page<T> {
  const start = (page - 1) * perPage;
  return {
    items: items.slice(start, start + perPage),
    pagination: {
      currentPage: page,
      perPage,
      pageCount: Math.ceil(items.length / perPage),
      totalScrobbles: items.length,
    },
  };
}
