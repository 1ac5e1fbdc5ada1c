import type { FilterQuery } from 'mongoose';
import type { IBook } from '../models/book.model';

export const BOOKS_PER_PAGE = 5;

export type BookSortField = 'title' | 'pages' | 'rating' | 'status' | 'publishedDate';

export interface BookSort {
  field: BookSortField;
  direction: 1 | -1;
}

/**
 * Every `order_by` value the list accepts. Anything else falls back to
 * ascending title; raw query input never reaches the sort clause.
 */
export const BOOK_SORT_OPTIONS = {
  title: { field: 'title', direction: 1 },
  '-title': { field: 'title', direction: -1 },
  pages: { field: 'pages', direction: 1 },
  '-pages': { field: 'pages', direction: -1 },
  rating: { field: 'rating', direction: 1 },
  '-rating': { field: 'rating', direction: -1 },
  status: { field: 'status', direction: 1 },
  '-status': { field: 'status', direction: -1 },
  published_date: { field: 'publishedDate', direction: 1 },
  '-published_date': { field: 'publishedDate', direction: -1 },
} as const satisfies Record<string, BookSort>;

export type BookOrderBy = keyof typeof BOOK_SORT_OPTIONS;

export const DEFAULT_ORDER_BY: BookOrderBy = 'title';

export interface BookListQuery {
  titleContains: string | null;
  orderBy: BookOrderBy;
  sort: BookSort;
}

export interface BookListParams {
  title?: unknown;
  orderBy?: unknown;
}

export const isBookOrderBy = (value: unknown): value is BookOrderBy =>
  typeof value === 'string' && Object.hasOwn(BOOK_SORT_OPTIONS, value);

export const buildBookListQuery = ({ title, orderBy }: BookListParams): BookListQuery => {
  const effectiveOrderBy = isBookOrderBy(orderBy) ? orderBy : DEFAULT_ORDER_BY;
  const titleContains = typeof title === 'string' && title.length > 0 ? title : null;

  return {
    titleContains,
    orderBy: effectiveOrderBy,
    sort: BOOK_SORT_OPTIONS[effectiveOrderBy],
  };
};

export const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const toMongoFilter = (query: BookListQuery): FilterQuery<IBook> => {
  if (query.titleContains === null) return {};
  return { title: { $regex: escapeRegExp(query.titleContains), $options: 'i' } };
};

// _id breaks ties so equal keys keep a stable order across pages.
export const toMongoSort = (query: BookListQuery): Record<string, 1 | -1> => ({
  [query.sort.field]: query.sort.direction,
  _id: 1,
});
