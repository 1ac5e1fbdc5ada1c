import { z } from 'zod';
import { ValidationError } from '../utils/customErrors';
import type { FieldErrors } from '../utils/customErrors';
import { INVALID_DATE_MESSAGE } from '../Books/models/book.rules';

export const INVALID_VALUE_MESSAGE = 'Enter a valid value.';

// Form posts send '' for untouched inputs; treat it the same as a missing key.
export const blankToUndefined = (value: unknown): unknown => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
};

// Plain decimal integers only; a trailing `.0` is tolerated.
const INTEGER_TEXT = /^\s*[+-]?\d+(\.0*)?\s*$/;

// Text that is not a plain integer is passed on unchanged so the number schema rejects it.
export const toNumber = (value: unknown): unknown => {
  const present = blankToUndefined(value);
  if (typeof present !== 'string') return present;
  return INTEGER_TEXT.test(present) ? Number(present.trim()) : present;
};

export const toList = (value: unknown): unknown => {
  const present = blankToUndefined(value);
  if (present === undefined) return [];
  return Array.isArray(present) ? present : [present];
};

export const toFlag = (value: unknown): boolean =>
  value === true || value === 'true' || value === 'on' || value === '1';

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Accepts `YYYY-MM-DD` only, read as UTC midnight. Anything else, timestamps
 * included, is returned unchanged so the date schema rejects it.
 */
export const toDate = (value: unknown): unknown => {
  const present = blankToUndefined(value);
  if (typeof present !== 'string') return present;

  const text = present.trim();
  const dateOnly = DATE_ONLY.exec(text);
  if (!dateOnly) return text;

  const year = Number(dateOnly[1]);
  const month = Number(dateOnly[2]) - 1;
  const day = Number(dateOnly[3]);
  const date = new Date(Date.UTC(year, month, day));
  const isRealDate =
    date.getUTCFullYear() === year && date.getUTCMonth() === month && date.getUTCDate() === day;
  return isRealDate ? date : text;
};

/** Error map giving one message for a missing value and one for a malformed one. */
export const fieldMessages =
  (requiredMessage: string, invalidMessage: string): z.ZodErrorMap =>
  (issue, ctx) => {
    if (issue.code === z.ZodIssueCode.invalid_type) {
      return {
        message: issue.received === z.ZodParsedType.undefined ? requiredMessage : invalidMessage,
      };
    }
    if (issue.code === z.ZodIssueCode.invalid_date) {
      return { message: INVALID_DATE_MESSAGE };
    }
    return { message: ctx.defaultError };
  };

export const toFieldErrors = (error: z.ZodError): FieldErrors => {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'nonFieldErrors';
    const existing = fields[field] ?? [];
    if (!existing.includes(issue.message)) {
      fields[field] = [...existing, issue.message];
    }
  }
  return fields;
};

export const parseForm = <T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
};
