import { z } from 'zod';
import { BookStatus } from '../Books/models/book.model';
import { AUTHOR_NAME_MAX_LENGTH } from '../Books/models/author.model';
import { isObjectIdString } from '../Books/repositories/book.repository';
import {
  INVALID_DATE_MESSAGE,
  PAGES_MIN,
  RATING_MAX,
  RATING_MIN,
  REQUIRED_MESSAGE,
  TITLE_REQUIRED_MESSAGE,
  TITLE_TOO_LONG_MESSAGE,
  WHOLE_NUMBER_MESSAGE,
  invalidChoiceMessage,
  isTitleWithinLimit,
  maxLengthMessage,
  maxValueMessage,
  minValueMessage,
  readDateOrderError,
} from '../Books/models/book.rules';
import type { FieldErrors } from '../utils/customErrors';
import { mergeFieldErrors } from '../utils/customErrors';
import {
  INVALID_VALUE_MESSAGE,
  blankToUndefined,
  fieldMessages,
  toDate,
  toFieldErrors,
  toFlag,
  toList,
  toNumber,
} from './formFields';

const choiceMessages: z.ZodErrorMap = (issue, ctx) => {
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return { message: invalidChoiceMessage(issue.received) };
  }
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return {
      message:
        issue.received === z.ZodParsedType.undefined
          ? REQUIRED_MESSAGE
          : invalidChoiceMessage(ctx.data),
    };
  }
  return { message: ctx.defaultError };
};

const titleField = z.preprocess(
  blankToUndefined,
  z
    .string({ errorMap: fieldMessages(TITLE_REQUIRED_MESSAGE, INVALID_VALUE_MESSAGE) })
    .trim()
    .min(1, TITLE_REQUIRED_MESSAGE)
    .refine(isTitleWithinLimit, TITLE_TOO_LONG_MESSAGE)
);

const wholeNumber = () =>
  z.number({ errorMap: fieldMessages(REQUIRED_MESSAGE, WHOLE_NUMBER_MESSAGE) }).int(WHOLE_NUMBER_MESSAGE);

const pagesField = z.preprocess(toNumber, wholeNumber().min(PAGES_MIN, minValueMessage(PAGES_MIN)));

const ratingField = z.preprocess(
  toNumber,
  wholeNumber()
    .min(RATING_MIN, minValueMessage(RATING_MIN))
    .max(RATING_MAX, maxValueMessage(RATING_MAX))
    .optional()
);

const statusField = z.preprocess(
  blankToUndefined,
  z.nativeEnum(BookStatus, { errorMap: choiceMessages })
);

const dateSchema = () =>
  z.date({ errorMap: fieldMessages(REQUIRED_MESSAGE, INVALID_DATE_MESSAGE) });

const publishedDateField = z.preprocess(toDate, dateSchema());

const readDateField = z.preprocess(toDate, dateSchema().optional());

const authorIdField = z
  .string({ errorMap: (_issue, ctx) => ({ message: invalidChoiceMessage(ctx.data) }) })
  .refine(isObjectIdString, (value) => ({ message: invalidChoiceMessage(value) }));

const authorsField = z.preprocess(
  toList,
  z.array(authorIdField).transform((ids) => [...new Set(ids.map((id) => id.toLowerCase()))])
);

interface DatePair {
  publishedDate: Date;
  readDate?: Date;
}

// The same rule the Book schema applies on save.
const checkReadDate = (data: DatePair, ctx: z.RefinementCtx): void => {
  const message = readDateOrderError(data.publishedDate, data.readDate);
  if (message) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['readDate'], message });
  }
};

export const bookFormSchema = z
  .object({
    title: titleField,
    pages: pagesField,
    rating: ratingField,
    status: statusField,
    publishedDate: publishedDateField,
    readDate: readDateField,
    authors: authorsField,
    coverImageClear: z.preprocess(toFlag, z.boolean()),
  })
  .superRefine(checkReadDate);

const bookDatesSchema = z
  .object({
    publishedDate: publishedDateField,
    readDate: readDateField,
  })
  .superRefine(checkReadDate);

export type BookFormData = z.output<typeof bookFormSchema>;

export type BookFormResult =
  | { success: true; data: BookFormData }
  | { success: false; errors: FieldErrors };

/**
 * Coerces raw form values and applies every field rule plus the read date
 * ordering rule. All failing fields are reported together.
 */
export const parseBookForm = (input: unknown): BookFormResult => {
  const parsed = bookFormSchema.safeParse(input);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  // zod skips object refinements once any field fails to coerce, so the date
  // rule is re-checked on the two dates alone.
  const dates = bookDatesSchema.safeParse(input);
  const errors = mergeFieldErrors(
    toFieldErrors(parsed.error),
    dates.success ? {} : toFieldErrors(dates.error)
  );
  return { success: false, errors };
};

const authorNameField = z.preprocess(
  blankToUndefined,
  z
    .string({ errorMap: fieldMessages(REQUIRED_MESSAGE, INVALID_VALUE_MESSAGE) })
    .trim()
    .min(1, REQUIRED_MESSAGE)
    .max(AUTHOR_NAME_MAX_LENGTH, maxLengthMessage(AUTHOR_NAME_MAX_LENGTH))
);

export const authorFormSchema = z.object({
  name: authorNameField,
  lastName: authorNameField,
});

export type AuthorFormData = z.output<typeof authorFormSchema>;

// Author ids of a submission whose author list is well formed, even when other fields fail.
export const authorIdsFrom = (input: unknown): string[] => {
  if (typeof input !== 'object' || input === null || !('authors' in input)) {
    return [];
  }
  const parsed = authorsField.safeParse(input.authors);
  return parsed.success ? parsed.data : [];
};
