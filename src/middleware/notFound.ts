import type { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../utils/customErrors';

const notFound = (req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError(`Resource Not Found - ${req.originalUrl}`));
};

export default notFound;
