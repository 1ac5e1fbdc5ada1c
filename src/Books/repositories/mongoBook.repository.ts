import Book from '../models/book.model';
import type { BookInput, BookStatus } from '../models/book.model';
import type { IAuthor } from '../models/author.model';
import { toMongoFilter, toMongoSort } from '../services/bookListQuery';
import type { BookListQuery } from '../services/bookListQuery';
import { toBookRecord } from './book.repository';
import type {
  BookRecord,
  BookRepository,
  BookStatsSnapshot,
  PageWindow,
} from './book.repository';

type PopulatedAuthors = { authors: IAuthor[] };

interface AveragesRow {
  _id: null;
  total: number;
  averagePages: number | null;
  averageRating: number | null;
}

interface GroupRow<T> {
  _id: T;
  count: number;
}

class MongoBookRepository implements BookRepository {
  async count(query: BookListQuery): Promise<number> {
    return Book.countDocuments(toMongoFilter(query));
  }

  async find(query: BookListQuery, window: PageWindow): Promise<BookRecord[]> {
    const books = await Book.find(toMongoFilter(query))
      .sort(toMongoSort(query))
      .skip(window.skip)
      .limit(window.limit)
      .populate<PopulatedAuthors>('authors');
    return books.map(toBookRecord);
  }

  async findById(id: string): Promise<BookRecord | null> {
    const book = await Book.findById(id).populate<PopulatedAuthors>('authors');
    return book ? toBookRecord(book) : null;
  }

  async create(input: BookInput): Promise<BookRecord> {
    const book = new Book(input);
    await book.save();
    return this.requireById(book._id.toHexString());
  }

  async update(id: string, changes: Partial<BookInput>): Promise<BookRecord | null> {
    const book = await Book.findById(id);
    if (!book) return null;

    // save() re-runs every schema validator, the date ordering rule included
    book.set(changes);
    await book.save();
    return this.requireById(id);
  }

  async delete(id: string): Promise<BookRecord | null> {
    const existing = await this.findById(id);
    if (!existing) return null;

    await Book.deleteOne({ _id: id });
    return existing;
  }

  async stats(): Promise<BookStatsSnapshot> {
    const [maxPagesBook, minPagesBook, averages, statusRows, ratingRows] = await Promise.all([
      Book.findOne().sort({ pages: -1, _id: 1 }).populate<PopulatedAuthors>('authors'),
      Book.findOne().sort({ pages: 1, _id: 1 }).populate<PopulatedAuthors>('authors'),
      Book.aggregate<AveragesRow>([
        {
          $group: {
            _id: null,
            total: { $sum: 1 },
            averagePages: { $avg: '$pages' },
            averageRating: { $avg: '$rating' },
          },
        },
      ]),
      Book.aggregate<GroupRow<BookStatus>>([
        { $group: { _id: '$status', count: { $sum: 1 } } },
        { $sort: { _id: 1 } },
      ]),
      Book.aggregate<GroupRow<number>>([
        { $match: { rating: { $ne: null } } },
        { $group: { _id: '$rating', count: { $sum: 1 } } },
        { $sort: { _id: 1 } },
      ]),
    ]);

    const totals = averages[0];

    return {
      total: totals?.total ?? 0,
      maxPagesBook: maxPagesBook ? toBookRecord(maxPagesBook) : null,
      minPagesBook: minPagesBook ? toBookRecord(minPagesBook) : null,
      averagePages: totals?.averagePages ?? null,
      averageRating: totals?.averageRating ?? null,
      statusCounts: statusRows.map((row) => ({ status: row._id, count: row.count })),
      ratingCounts: ratingRows.map((row) => ({ rating: row._id, count: row.count })),
    };
  }

  private async requireById(id: string): Promise<BookRecord> {
    const book = await this.findById(id);
    if (!book) {
      throw new Error(`Book ${id} disappeared after being saved`);
    }
    return book;
  }
}

export default MongoBookRepository;
