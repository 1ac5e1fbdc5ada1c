import type { Request } from 'express';
import multer, { FileFilterCallback } from 'multer';
import path from 'path';
import fs from 'fs';
import { COVERS_PREFIX } from '../Books/models/book.model';
import { ValidationError } from '../utils/customErrors';
import logger from '../utils/logger';

export const COVER_FIELD = 'coverImage';
export const MAX_COVER_SIZE = 5 * 1024 * 1024; // 5MB
const allowedTypes = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

export const coversDirectory = (uploadsDir: string): string =>
  path.resolve(uploadsDir, COVERS_PREFIX);

export const coverPathFor = (file: Express.Multer.File): string =>
  `${COVERS_PREFIX}${file.filename}`;

export const fileFilter = (
  _req: Request,
  file: Express.Multer.File,
  cb: FileFilterCallback
) => {
  if (allowedTypes.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(
      new ValidationError({
        [COVER_FIELD]: [
          'Upload a valid image. The file you uploaded was either not an image or a corrupted image.',
        ],
      })
    );
  }
};

export const coverFileName = (originalName: string): string =>
  `${Date.now()}-${Math.round(Math.random() * 1e9)}-${path.basename(originalName)}`;

// Accepts at most one cover per request; non-multipart bodies pass straight through.
export const createCoverUpload = (uploadsDir: string) => {
  const storage = multer.diskStorage({
    destination: coversDirectory(uploadsDir),
    filename: function (
      _req: Request,
      file: Express.Multer.File,
      cb: (error: Error | null, filename: string) => void
    ) {
      cb(null, coverFileName(file.originalname));
    },
  });

  return multer({
    storage,
    limits: { fileSize: MAX_COVER_SIZE },
    fileFilter,
  }).single(COVER_FIELD);
};

// Removes a stored upload whose submission was rejected.
export const discardUpload = async (file: Express.Multer.File | undefined): Promise<void> => {
  if (!file) return;
  try {
    await fs.promises.unlink(file.path);
  } catch (error) {
    logger.warn(
      `Could not remove rejected upload ${file.path}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
};
