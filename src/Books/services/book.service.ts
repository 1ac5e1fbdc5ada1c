import { BOOK_STATUS_LABELS, BookStatus } from '../models/book.model';
import type { BookInput } from '../models/book.model';
import { invalidChoiceMessage } from '../models/book.rules';
import { isObjectIdString } from '../repositories/book.repository';
import type {
  AuthorRecord,
  AuthorRepository,
  BookRecord,
  BookRepository,
} from '../repositories/book.repository';
import { BOOKS_PER_PAGE, buildBookListQuery } from './bookListQuery';
import type { BookOrderBy } from './bookListQuery';
import { buildStatsReport } from './bookStats';
import type { BookStatsReport } from './bookStats';
import { authorIdsFrom, parseBookForm } from '../../validators/book.validators';
import type { BookFormData } from '../../validators/book.validators';
import { NotFoundError, ValidationError, hasFieldErrors, mergeFieldErrors } from '../../utils/customErrors';
import type { FieldErrors } from '../../utils/customErrors';
import { pageWindow, resolvePage } from '../../utils/pagination';
import type { PageInfo } from '../../utils/pagination';
import logger from '../../utils/logger';

export interface BookListRequest {
  title?: unknown;
  orderBy?: unknown;
  page?: unknown;
}

export interface BookListPage {
  books: BookRecord[];
  pagination: PageInfo;
  titleFilter: string;
  orderBy: BookOrderBy;
}

export interface StatusChoice {
  value: BookStatus;
  label: string;
}

export interface BookFormChoices {
  statuses: StatusChoice[];
  authors: AuthorRecord[];
}

const toBookInput = (form: BookFormData): BookInput => ({
  title: form.title,
  pages: form.pages,
  rating: form.rating ?? null,
  status: form.status,
  publishedDate: form.publishedDate,
  readDate: form.readDate ?? null,
  authors: form.authors,
});

class BookService {
  constructor(
    private readonly books: BookRepository,
    private readonly authors: AuthorRepository
  ) {}

  async list(request: BookListRequest): Promise<BookListPage> {
    const query = buildBookListQuery(request);
    const total = await this.books.count(query);
    const pagination = resolvePage(request.page, total, BOOKS_PER_PAGE);
    const books = total === 0 ? [] : await this.books.find(query, pageWindow(pagination));

    return {
      books,
      pagination,
      titleFilter: query.titleContains ?? '',
      orderBy: query.orderBy,
    };
  }

  async getById(id: string): Promise<BookRecord> {
    const book = isObjectIdString(id) ? await this.books.findById(id) : null;
    if (!book) {
      throw new NotFoundError('Book not found');
    }
    return book;
  }

  async formChoices(): Promise<BookFormChoices> {
    const statuses = Object.values(BookStatus).map((value) => ({
      value,
      label: BOOK_STATUS_LABELS[value],
    }));
    return { statuses, authors: await this.authors.list() };
  }

  /**
   * Form-layer validation of a submitted book. Collects field errors, the
   * read date ordering error and unknown author ids into one ValidationError.
   */
  async clean(raw: unknown): Promise<BookFormData> {
    const result = parseBookForm(raw);
    const ids = result.success ? result.data.authors : authorIdsFrom(raw);
    const missing = await this.authors.findMissing(ids);

    const authorErrors: FieldErrors =
      missing.length > 0 ? { authors: missing.map(invalidChoiceMessage) } : {};
    const errors = mergeFieldErrors(result.success ? {} : result.errors, authorErrors);

    if (!result.success || hasFieldErrors(errors)) {
      throw new ValidationError(errors);
    }
    return result.data;
  }

  async create(form: BookFormData, coverImage: string | null): Promise<BookRecord> {
    const book = await this.books.create({ ...toBookInput(form), coverImage });
    logger.info(`Book created: ${book.id} "${book.title}"`);
    return book;
  }

  /**
   * Applies a validated form to an existing book. The stored cover is kept
   * unless a new one was uploaded or the form asks to clear it.
   */
  async update(id: string, form: BookFormData, uploadedCover: string | null): Promise<BookRecord> {
    await this.getById(id);

    const changes: Partial<BookInput> = toBookInput(form);
    if (uploadedCover) {
      changes.coverImage = uploadedCover;
    } else if (form.coverImageClear) {
      changes.coverImage = null;
    }

    const book = await this.books.update(id, changes);
    if (!book) {
      throw new NotFoundError('Book not found');
    }
    logger.info(`Book updated: ${book.id}`);
    return book;
  }

  async remove(id: string): Promise<BookRecord> {
    const book = isObjectIdString(id) ? await this.books.delete(id) : null;
    if (!book) {
      throw new NotFoundError('Book not found');
    }
    logger.info(`Book deleted: ${book.id} "${book.title}"`);
    return book;
  }

  async stats(): Promise<BookStatsReport> {
    return buildStatsReport(await this.books.stats());
  }
}

export default BookService;
