import { Request, Response } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import logger from '../../utils/logger';
import { getUser } from '../../middleware/auth.middleware';
import { coverPathFor, discardUpload } from '../../middleware/uploadCover';
import type BookService from '../services/book.service';
import type { BookFormChoices, BookListPage } from '../services/book.service';
import type { BookRecord } from '../repositories/book.repository';
import type { BookStatsReport } from '../services/bookStats';

interface IBookResponse<T> {
  success: boolean;
  message?: string;
  data: T;
}

interface BookWithChoices {
  book: BookRecord;
  choices: BookFormChoices;
}

class BookController {
  constructor(private readonly bookService: BookService) {}

  list = asyncHandler(
    async (req: Request, res: Response<IBookResponse<BookListPage>>): Promise<void> => {
      const { title, order_by: orderBy, page } = req.query;
      const result = await this.bookService.list({ title, orderBy, page });
      res.status(200).json({ success: true, data: result });
    }
  );

  showCreateForm = asyncHandler(
    async (_req: Request, res: Response<IBookResponse<BookFormChoices>>): Promise<void> => {
      const choices = await this.bookService.formChoices();
      res.status(200).json({ success: true, data: choices });
    }
  );

  create = asyncHandler(
    async (req: Request, res: Response<IBookResponse<BookRecord>>): Promise<void> => {
      const user = getUser(req);
      try {
        const form = await this.bookService.clean(req.body);
        const book = await this.bookService.create(form, req.file ? coverPathFor(req.file) : null);
        logger.info(`User ${user.username} added book ${book.id}`);
        res.status(201).json({ success: true, message: 'Book created successfully', data: book });
      } catch (error) {
        await discardUpload(req.file);
        throw error;
      }
    }
  );

  detail = asyncHandler(
    async (req: Request<{ id: string }>, res: Response<IBookResponse<BookRecord>>): Promise<void> => {
      const book = await this.bookService.getById(req.params.id);
      res.status(200).json({ success: true, data: book });
    }
  );

  showEditForm = asyncHandler(
    async (req: Request<{ id: string }>, res: Response<IBookResponse<BookWithChoices>>): Promise<void> => {
      const [book, choices] = await Promise.all([
        this.bookService.getById(req.params.id),
        this.bookService.formChoices(),
      ]);
      res.status(200).json({ success: true, data: { book, choices } });
    }
  );

  update = asyncHandler(
    async (req: Request<{ id: string }>, res: Response<IBookResponse<BookRecord>>): Promise<void> => {
      const user = getUser(req);
      try {
        const form = await this.bookService.clean(req.body);
        const book = await this.bookService.update(
          req.params.id,
          form,
          req.file ? coverPathFor(req.file) : null
        );
        logger.info(`User ${user.username} edited book ${book.id}`);
        res.status(200).json({ success: true, message: 'Book updated successfully', data: book });
      } catch (error) {
        await discardUpload(req.file);
        throw error;
      }
    }
  );

  confirmDelete = asyncHandler(
    async (req: Request<{ id: string }>, res: Response<IBookResponse<BookRecord>>): Promise<void> => {
      const book = await this.bookService.getById(req.params.id);
      res.status(200).json({
        success: true,
        message: `Are you sure you want to delete "${book.title}"?`,
        data: book,
      });
    }
  );

  remove = asyncHandler(
    async (req: Request<{ id: string }>, res: Response<IBookResponse<BookRecord>>): Promise<void> => {
      const user = getUser(req);
      const book = await this.bookService.remove(req.params.id);
      logger.info(`User ${user.username} deleted book ${book.id}`);
      res.status(200).json({ success: true, message: 'Book deleted successfully', data: book });
    }
  );

  stats = asyncHandler(
    async (_req: Request, res: Response<IBookResponse<BookStatsReport>>): Promise<void> => {
      const report = await this.bookService.stats();
      res.status(200).json({ success: true, data: report });
    }
  );
}

export default BookController;
