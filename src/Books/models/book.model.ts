import mongoose, { Document, Schema, Types } from 'mongoose';
import type { FieldErrors } from '../../utils/customErrors';
import {
  INVALID_DATE_MESSAGE,
  PAGES_MIN,
  RATING_MAX,
  RATING_MIN,
  READ_DATE_ORDER_MESSAGE,
  REQUIRED_MESSAGE,
  TITLE_REQUIRED_MESSAGE,
  TITLE_TOO_LONG_MESSAGE,
  WHOLE_NUMBER_MESSAGE,
  invalidChoiceMessage,
  isTitleWithinLimit,
  maxValueMessage,
  minValueMessage,
  readDateOrderError,
  toCalendarDate,
} from './book.rules';

// Reading status codes, stored as-is
export enum BookStatus {
  PLANNED = 'PE',
  IN_PROGRESS = 'RE',
  FINISHED = 'FI',
}

export const BOOK_STATUS_LABELS: Record<BookStatus, string> = {
  [BookStatus.PLANNED]: 'Planned to read',
  [BookStatus.IN_PROGRESS]: 'In progress',
  [BookStatus.FINISHED]: 'Finished',
};

export const COVERS_PREFIX = 'covers/';

export interface IBook extends Document<Types.ObjectId> {
  title: string;
  pages: number;
  rating: number | null;
  status: BookStatus;
  publishedDate: Date;
  readDate: Date | null;
  coverImage: string | null; // Relative to the uploads dir, under covers/
  authors: Types.ObjectId[];
  createdAt: Date;
  updatedAt: Date;
}

// Fields accepted when building or updating a book
export interface BookInput {
  title: string;
  pages: number;
  status: BookStatus;
  publishedDate: Date;
  authors: string[];
  rating?: number | null;
  readDate?: Date | null;
  coverImage?: string | null;
}

const BookSchema: Schema<IBook> = new Schema(
  {
    title: {
      type: String,
      required: [true, TITLE_REQUIRED_MESSAGE],
      trim: true,
      validate: {
        validator: isTitleWithinLimit,
        message: TITLE_TOO_LONG_MESSAGE,
      },
    },
    pages: {
      type: Number,
      required: [true, REQUIRED_MESSAGE],
      min: [PAGES_MIN, minValueMessage(PAGES_MIN)],
      validate: {
        validator: (value: number) => Number.isInteger(value),
        message: WHOLE_NUMBER_MESSAGE,
      },
    },
    rating: {
      type: Number,
      default: null,
      min: [RATING_MIN, minValueMessage(RATING_MIN)],
      max: [RATING_MAX, maxValueMessage(RATING_MAX)],
      validate: {
        validator: (value: number | null) => value === null || Number.isInteger(value),
        message: WHOLE_NUMBER_MESSAGE,
      },
    },
    status: {
      type: String,
      required: [true, REQUIRED_MESSAGE],
      enum: {
        values: Object.values(BookStatus),
        message: 'Select a valid choice. {VALUE} is not one of the available choices.',
      },
      default: BookStatus.PLANNED,
    },
    publishedDate: {
      type: Date,
      required: [true, REQUIRED_MESSAGE],
      set: toCalendarDate,
    },
    readDate: {
      type: Date,
      default: null,
      set: toCalendarDate,
      validate: {
        validator: function (this: IBook, value: Date | null) {
          return readDateOrderError(this.publishedDate, value) === null;
        },
        message: READ_DATE_ORDER_MESSAGE,
      },
    },
    coverImage: {
      type: String,
      default: null,
    },
    authors: [
      {
        type: Schema.Types.ObjectId,
        ref: 'Author',
      },
    ],
  },
  {
    timestamps: true,
  }
);

BookSchema.index({ title: 1 });
BookSchema.index({ status: 1 });

const Book = mongoose.model<IBook>('Book', BookSchema, 'Books');

const castErrorMessage = (error: mongoose.Error.CastError): string => {
  switch (error.kind.toLowerCase()) {
    case 'date':
      return INVALID_DATE_MESSAGE;
    case 'number':
      return WHOLE_NUMBER_MESSAGE;
    default:
      return invalidChoiceMessage(error.value);
  }
};

/**
 * Flattens a Mongoose validation error into field -> messages. Array element
 * paths such as `authors.0` are reported against the array field.
 */
export const fieldErrorsFrom = (error: mongoose.Error.ValidationError): FieldErrors => {
  const fields: FieldErrors = {};
  for (const [path, failure] of Object.entries(error.errors)) {
    const field = path.split('.')[0];
    const message =
      failure instanceof mongoose.Error.CastError ? castErrorMessage(failure) : failure.message;
    const existing = fields[field] ?? [];
    if (!existing.includes(message)) {
      fields[field] = [...existing, message];
    }
  }
  return fields;
};

export const buildBook = (input: BookInput): IBook => new Book(input);

// Runs the persistence-layer rules without saving; an empty map means valid.
export const validateBookRecord = (input: BookInput): FieldErrors => {
  const error = buildBook(input).validateSync();
  return error ? fieldErrorsFrom(error) : {};
};

export default Book;
