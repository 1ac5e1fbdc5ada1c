import {
  BOOK_SORT_OPTIONS,
  buildBookListQuery,
  escapeRegExp,
  toMongoFilter,
  toMongoSort,
} from './bookListQuery';

describe('buildBookListQuery', () => {
  it('accepts exactly ten sort keys', () => {
    expect(Object.keys(BOOK_SORT_OPTIONS)).toHaveLength(10);
  });

  it.each(Object.keys(BOOK_SORT_OPTIONS))('keeps the whitelisted key %s', (orderBy) => {
    expect(buildBookListQuery({ orderBy }).orderBy).toBe(orderBy);
  });

  it('maps published_date onto the stored field', () => {
    expect(buildBookListQuery({ orderBy: '-published_date' }).sort).toEqual({
      field: 'publishedDate',
      direction: -1,
    });
  });

  it.each([undefined, '', 'bogus_value', 'publishedDate', '__proto__'])(
    'falls back to ascending title for %p',
    (orderBy) => {
      const query = buildBookListQuery({ orderBy });
      expect(query.orderBy).toBe('title');
      expect(query.sort).toEqual({ field: 'title', direction: 1 });
    }
  );

  it('ignores a repeated order_by parameter', () => {
    expect(buildBookListQuery({ orderBy: ['pages', '-pages'] }).orderBy).toBe('title');
  });

  it('treats an empty title as no filter', () => {
    expect(buildBookListQuery({ title: '' }).titleContains).toBeNull();
    expect(toMongoFilter(buildBookListQuery({ title: '' }))).toEqual({});
  });
});

describe('toMongoFilter', () => {
  it('matches titles case-insensitively', () => {
    expect(toMongoFilter(buildBookListQuery({ title: 'test' }))).toEqual({
      title: { $regex: 'test', $options: 'i' },
    });
  });

  it('escapes regular expression syntax in the filter text', () => {
    expect(toMongoFilter(buildBookListQuery({ title: 'C++ (2nd ed.)' }))).toEqual({
      title: { $regex: 'C\\+\\+ \\(2nd ed\\.\\)', $options: 'i' },
    });
  });
});

describe('escapeRegExp', () => {
  it('produces a pattern matching the text literally', () => {
    const pattern = new RegExp(escapeRegExp('test'), 'i');

    expect(pattern.test('Test Book')).toBe(true);
    expect(pattern.test('a TEST')).toBe(true);
    expect(pattern.test('Other')).toBe(false);
  });

  it('does not let wildcards through', () => {
    const pattern = new RegExp(escapeRegExp('.*'), 'i');

    expect(pattern.test('Anything')).toBe(false);
    expect(pattern.test('glob .* syntax')).toBe(true);
  });
});

describe('toMongoSort', () => {
  it('adds the id as a tiebreaker', () => {
    expect(toMongoSort(buildBookListQuery({ orderBy: '-rating' }))).toEqual({
      rating: -1,
      _id: 1,
    });
  });
});
