// Field limits and messages shared by the Book schema and the book form.

export const TITLE_MAX_LENGTH = 50;
export const PAGES_MIN = 1;
export const RATING_MIN = 1;
export const RATING_MAX = 5;

export const TITLE_REQUIRED_MESSAGE = 'The title is mandatory';
export const TITLE_TOO_LONG_MESSAGE = 'The title must be less than 50 characters long';
export const READ_DATE_ORDER_MESSAGE = 'The read date must be after the published date';

export const REQUIRED_MESSAGE = 'This field is required.';
export const WHOLE_NUMBER_MESSAGE = 'Enter a whole number.';
export const INVALID_DATE_MESSAGE = 'Enter a valid date.';

export const minValueMessage = (min: number): string =>
  `Ensure this value is greater than or equal to ${min}.`;

export const maxValueMessage = (max: number): string =>
  `Ensure this value is less than or equal to ${max}.`;

export const maxLengthMessage = (max: number): string =>
  `Ensure this value has at most ${max} characters.`;

// Length in characters; astral-plane symbols count once.
export const characterCount = (value: string): number => [...value].length;

export const isTitleWithinLimit = (title: string): boolean =>
  characterCount(title) <= TITLE_MAX_LENGTH;

/**
 * Drops the time of day, keeping the UTC calendar date. Values that do not
 * read as a date are returned as given for the schema to reject.
 */
export const toCalendarDate = (value: unknown): unknown => {
  const date =
    value instanceof Date
      ? value
      : typeof value === 'string' || typeof value === 'number'
        ? new Date(value)
        : null;
  if (date === null || Number.isNaN(date.getTime())) return value;
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
};

export const invalidChoiceMessage = (value: unknown): string =>
  `Select a valid choice. ${String(value)} is not one of the available choices.`;

/**
 * The one place the read/published date ordering is decided. Both the form
 * schema and the persistence schema call it, so neither entry point can let a
 * book through with a read date earlier than its publication date. Equal
 * dates are allowed.
 */
export const readDateOrderError = (
  publishedDate: Date | null | undefined,
  readDate: Date | null | undefined
): string | null => {
  if (!publishedDate || !readDate) return null;
  if (Number.isNaN(publishedDate.getTime()) || Number.isNaN(readDate.getTime())) {
    return null;
  }
  return readDate.getTime() < publishedDate.getTime() ? READ_DATE_ORDER_MESSAGE : null;
};
