import Author from '../models/author.model';
import { toAuthorRecord } from './book.repository';
import type { AuthorInput, AuthorRecord, AuthorRepository } from './book.repository';

class MongoAuthorRepository implements AuthorRepository {
  async list(): Promise<AuthorRecord[]> {
    const authors = await Author.find().sort({ lastName: 1, name: 1, _id: 1 });
    return authors.map(toAuthorRecord);
  }

  async create(input: AuthorInput): Promise<AuthorRecord> {
    const author = await Author.create(input);
    return toAuthorRecord(author);
  }

  async findMissing(ids: string[]): Promise<string[]> {
    if (ids.length === 0) return [];

    const found = await Author.find({ _id: { $in: ids } }).select('_id');
    const foundIds = new Set(found.map((author) => author._id.toHexString()));
    return ids.filter((id) => !foundIds.has(id.toLowerCase()));
  }
}

export default MongoAuthorRepository;
