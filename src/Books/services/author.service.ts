import type { AuthorRecord, AuthorRepository } from '../repositories/book.repository';
import { authorFormSchema } from '../../validators/book.validators';
import { parseForm } from '../../validators/formFields';
import logger from '../../utils/logger';

class AuthorService {
  constructor(private readonly authors: AuthorRepository) {}

  async list(): Promise<AuthorRecord[]> {
    return this.authors.list();
  }

  async create(raw: unknown): Promise<AuthorRecord> {
    const input = parseForm(authorFormSchema, raw);
    const author = await this.authors.create(input);
    logger.info(`Author created: ${author.id} ${author.fullName}`);
    return author;
  }
}

export default AuthorService;
