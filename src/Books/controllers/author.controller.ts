import { Request, Response } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import { SuccessResponse } from '../../utils/ResponseHelpers';
import type AuthorService from '../services/author.service';

class AuthorController {
  constructor(private readonly authorService: AuthorService) {}

  list = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const authors = await this.authorService.list();
    SuccessResponse(res, 'Authors retrieved', 200, authors);
  });

  create = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const author = await this.authorService.create(req.body);
    SuccessResponse(res, 'Author created successfully', 201, author);
  });
}

export default AuthorController;
