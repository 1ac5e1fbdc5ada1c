import type { Types } from 'mongoose';
import { BOOK_STATUS_LABELS, BookStatus } from '../models/book.model';
import type { BookInput } from '../models/book.model';
import type { BookListQuery } from '../services/bookListQuery';

export interface AuthorRecord {
  id: string;
  name: string;
  lastName: string;
  fullName: string;
}

export interface BookRecord {
  id: string;
  title: string;
  pages: number;
  rating: number | null;
  status: BookStatus;
  statusLabel: string;
  publishedDate: Date;
  readDate: Date | null;
  coverImage: string | null;
  authors: AuthorRecord[];
  createdAt: Date;
  updatedAt: Date;
}

export interface AuthorInput {
  name: string;
  lastName: string;
}

export interface StatusCount {
  status: BookStatus;
  count: number;
}

export interface RatingCount {
  rating: number;
  count: number;
}

// Raw aggregation results, before rounding and chart shaping.
export interface BookStatsSnapshot {
  total: number;
  maxPagesBook: BookRecord | null;
  minPagesBook: BookRecord | null;
  averagePages: number | null;
  averageRating: number | null;
  statusCounts: StatusCount[];
  ratingCounts: RatingCount[];
}

export interface PageWindow {
  skip: number;
  limit: number;
}

export interface BookRepository {
  count(query: BookListQuery): Promise<number>;
  find(query: BookListQuery, window: PageWindow): Promise<BookRecord[]>;
  findById(id: string): Promise<BookRecord | null>;
  create(input: BookInput): Promise<BookRecord>;
  update(id: string, changes: Partial<BookInput>): Promise<BookRecord | null>;
  delete(id: string): Promise<BookRecord | null>;
  stats(): Promise<BookStatsSnapshot>;
}

export interface AuthorRepository {
  list(): Promise<AuthorRecord[]>;
  create(input: AuthorInput): Promise<AuthorRecord>;
  // Ids from the list that match no stored author
  findMissing(ids: string[]): Promise<string[]>;
}

interface AuthorSource {
  _id: Types.ObjectId;
  name: string;
  lastName: string;
}

interface BookSource {
  _id: Types.ObjectId;
  title: string;
  pages: number;
  rating: number | null;
  status: BookStatus;
  publishedDate: Date;
  readDate: Date | null;
  coverImage: string | null;
  authors: AuthorSource[];
  createdAt: Date;
  updatedAt: Date;
}

export const toAuthorRecord = (author: AuthorSource): AuthorRecord => ({
  id: author._id.toHexString(),
  name: author.name,
  lastName: author.lastName,
  fullName: `${author.name} ${author.lastName}`,
});

export const toBookRecord = (book: BookSource): BookRecord => ({
  id: book._id.toHexString(),
  title: book.title,
  pages: book.pages,
  rating: book.rating ?? null,
  status: book.status,
  statusLabel: BOOK_STATUS_LABELS[book.status],
  publishedDate: book.publishedDate,
  readDate: book.readDate ?? null,
  coverImage: book.coverImage ?? null,
  authors: book.authors.map(toAuthorRecord),
  createdAt: book.createdAt,
  updatedAt: book.updatedAt,
});

export const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const isObjectIdString = (value: string): boolean => OBJECT_ID_PATTERN.test(value);
