import MongoBookRepository from '../Books/repositories/mongoBook.repository';
import MongoAuthorRepository from '../Books/repositories/mongoAuthor.repository';
import type { AuthorRepository, BookRepository } from '../Books/repositories/book.repository';
import { MongoUserRepository } from './user.repository';
import type { UserRepository } from './user.repository';

export interface Repositories {
  books: BookRepository;
  authors: AuthorRepository;
  users: UserRepository;
}

export const createMongoRepositories = (): Repositories => ({
  books: new MongoBookRepository(),
  authors: new MongoAuthorRepository(),
  users: new MongoUserRepository(),
});
