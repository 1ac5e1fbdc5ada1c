import { BookStatus } from '../Books/models/book.model';
import {
  INVALID_DATE_MESSAGE,
  READ_DATE_ORDER_MESSAGE,
  REQUIRED_MESSAGE,
  TITLE_REQUIRED_MESSAGE,
  TITLE_TOO_LONG_MESSAGE,
  WHOLE_NUMBER_MESSAGE,
} from '../Books/models/book.rules';
import { authorFormSchema, authorIdsFrom, parseBookForm } from './book.validators';
import type { BookFormResult } from './book.validators';
import { parseForm } from './formFields';

const AUTHOR_ID = '64b7f0c2a1b2c3d4e5f60718';

const submission = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  title: 'Kindred',
  pages: '264',
  rating: '',
  status: 'FI',
  publishedDate: '1979-06-01',
  readDate: '',
  ...overrides,
});

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

const errorsOf = (result: BookFormResult) => (result.success ? {} : result.errors);

describe('parseBookForm', () => {
  it('coerces a valid submission', () => {
    const result = parseBookForm(submission());

    expect(result).toEqual({
      success: true,
      data: {
        title: 'Kindred',
        pages: 264,
        rating: undefined,
        status: BookStatus.FINISHED,
        publishedDate: new Date(Date.UTC(1979, 5, 1)),
        readDate: undefined,
        authors: [],
        coverImageClear: false,
      },
    });
  });

  describe('title', () => {
    it('accepts exactly 50 characters', () => {
      expect(parseBookForm(submission({ title: 'a'.repeat(50) })).success).toBe(true);
    });

    it('rejects 51 characters with the length message', () => {
      expect(errorsOf(parseBookForm(submission({ title: 'a'.repeat(51) })))).toEqual({
        title: [TITLE_TOO_LONG_MESSAGE],
      });
    });

    it('counts astral-plane symbols as one character each', () => {
      expect(parseBookForm(submission({ title: '\u{1D538}'.repeat(50) })).success).toBe(true);
      expect(errorsOf(parseBookForm(submission({ title: '\u{1D538}'.repeat(51) })))).toEqual({
        title: [TITLE_TOO_LONG_MESSAGE],
      });
    });

    it.each(['', '   ', undefined])('requires a title, got %p', (title) => {
      expect(errorsOf(parseBookForm(submission({ title })))).toEqual({
        title: [TITLE_REQUIRED_MESSAGE],
      });
    });

    it('trims surrounding whitespace', () => {
      const result = parseBookForm(submission({ title: '  Kindred  ' }));
      expect(result.success && result.data.title).toBe('Kindred');
    });
  });

  describe('numbers', () => {
    it('rejects non-numeric pages', () => {
      expect(errorsOf(parseBookForm(submission({ pages: 'many' })))).toEqual({
        pages: [WHOLE_NUMBER_MESSAGE],
      });
    });

    it('rejects fractional pages', () => {
      expect(errorsOf(parseBookForm(submission({ pages: '2.5' })))).toEqual({
        pages: [WHOLE_NUMBER_MESSAGE],
      });
    });

    it.each(['0x10', '1e2', '0b11'])('rejects non-decimal notation %p', (pages) => {
      expect(errorsOf(parseBookForm(submission({ pages })))).toEqual({
        pages: [WHOLE_NUMBER_MESSAGE],
      });
    });

    it('accepts a whole number written with a trailing .0', () => {
      const result = parseBookForm(submission({ pages: '1.0' }));
      expect(result.success && result.data.pages).toBe(1);
    });

    it('rejects zero pages', () => {
      expect(errorsOf(parseBookForm(submission({ pages: '0' })))).toEqual({
        pages: ['Ensure this value is greater than or equal to 1.'],
      });
    });

    it('requires pages', () => {
      expect(errorsOf(parseBookForm(submission({ pages: '' })))).toEqual({
        pages: [REQUIRED_MESSAGE],
      });
    });

    it('rejects a rating above 5', () => {
      expect(errorsOf(parseBookForm(submission({ rating: '6' })))).toEqual({
        rating: ['Ensure this value is less than or equal to 5.'],
      });
    });

    it('accepts a rating sent as a number', () => {
      const result = parseBookForm(submission({ rating: 5 }));
      expect(result.success && result.data.rating).toBe(5);
    });
  });

  it('rejects an unknown status code', () => {
    expect(errorsOf(parseBookForm(submission({ status: 'XX' })))).toEqual({
      status: ['Select a valid choice. XX is not one of the available choices.'],
    });
  });

  describe('dates', () => {
    it.each(['yesterday', '2021-02-30', '01/02/2021', '2024-01-01T10:00:00Z'])(
      'rejects %p',
      (publishedDate) => {
        expect(errorsOf(parseBookForm(submission({ publishedDate })))).toEqual({
          publishedDate: [INVALID_DATE_MESSAGE],
        });
      }
    );

    it('requires a published date', () => {
      expect(errorsOf(parseBookForm(submission({ publishedDate: '' })))).toEqual({
        publishedDate: [REQUIRED_MESSAGE],
      });
    });

    it('rejects a read date before the published date', () => {
      const result = parseBookForm(
        submission({ publishedDate: '2020-05-10', readDate: '2020-05-09' })
      );
      expect(errorsOf(result)).toEqual({ readDate: [READ_DATE_ORDER_MESSAGE] });
    });

    it('accepts equal dates', () => {
      const result = parseBookForm(
        submission({ publishedDate: '2020-05-10', readDate: '2020-05-10' })
      );
      expect(result.success).toBe(true);
    });

    it('accepts a read date on the publication day', () => {
      const result = parseBookForm(
        submission({ publishedDate: '2024-01-01', readDate: '2024-01-01' })
      );
      expect(result.success && result.data.publishedDate).toEqual(new Date(Date.UTC(2024, 0, 1)));
      expect(result.success && result.data.readDate).toEqual(new Date(Date.UTC(2024, 0, 1)));
    });
  });

  it('reports the date ordering alongside other field errors', () => {
    const result = parseBookForm(
      submission({
        title: '',
        pages: 'lots',
        publishedDate: '2020-05-10',
        readDate: '2020-01-01',
      })
    );

    expect(errorsOf(result)).toEqual({
      title: [TITLE_REQUIRED_MESSAGE],
      pages: [WHOLE_NUMBER_MESSAGE],
      readDate: [READ_DATE_ORDER_MESSAGE],
    });
  });

  describe('authors', () => {
    it('accepts a single id', () => {
      const result = parseBookForm(submission({ authors: AUTHOR_ID }));
      expect(result.success && result.data.authors).toEqual([AUTHOR_ID]);
    });

    it('collapses duplicate ids', () => {
      const result = parseBookForm(
        submission({ authors: [AUTHOR_ID, AUTHOR_ID.toUpperCase()] })
      );
      expect(result.success && result.data.authors).toEqual([AUTHOR_ID]);
    });

    it('rejects malformed ids', () => {
      expect(errorsOf(parseBookForm(submission({ authors: ['nope'] })))).toEqual({
        authors: ['Select a valid choice. nope is not one of the available choices.'],
      });
    });
  });

  it('reads the clear-cover checkbox', () => {
    const result = parseBookForm(submission({ coverImageClear: 'on' }));
    expect(result.success && result.data.coverImageClear).toBe(true);
  });
});

describe('authorIdsFrom', () => {
  it('returns well-formed ids even when other fields fail', () => {
    expect(authorIdsFrom({ title: '', authors: [AUTHOR_ID] })).toEqual([AUTHOR_ID]);
  });

  it('returns nothing for malformed or missing ids', () => {
    expect(authorIdsFrom({ authors: ['nope'] })).toEqual([]);
    expect(authorIdsFrom({})).toEqual([]);
    expect(authorIdsFrom('not an object')).toEqual([]);
  });
});

describe('authorFormSchema', () => {
  it('requires both names', () => {
    const error = captureError(() =>
      parseForm(authorFormSchema, { name: 'Octavia', lastName: '' })
    );
    expect(error).toMatchObject({ fields: { lastName: [REQUIRED_MESSAGE] } });
  });

  it('trims names', () => {
    expect(parseForm(authorFormSchema, { name: ' Octavia ', lastName: 'Butler' })).toEqual({
      name: 'Octavia',
      lastName: 'Butler',
    });
  });
});
