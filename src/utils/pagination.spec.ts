import { pageWindow, resolvePage } from './pagination';

describe('resolvePage', () => {
  it('starts on the first page when no page is requested', () => {
    expect(resolvePage(undefined, 12, 5)).toEqual({
      page: 1,
      perPage: 5,
      totalItems: 12,
      totalPages: 3,
      hasNext: true,
      hasPrevious: false,
    });
  });

  it('returns the requested page when it exists', () => {
    const info = resolvePage('2', 12, 5);
    expect(info.page).toBe(2);
    expect(info.hasNext).toBe(true);
    expect(info.hasPrevious).toBe(true);
  });

  it.each(['abc', '1.5', '', 2.5])('falls back to the first page for %p', (requested) => {
    expect(resolvePage(requested, 12, 5).page).toBe(1);
  });

  it.each(['9', '0', '-1'])('clamps out-of-range page %p to the last page', (requested) => {
    const info = resolvePage(requested, 12, 5);
    expect(info.page).toBe(3);
    expect(info.hasNext).toBe(false);
  });

  it('has a single empty page when there are no items', () => {
    expect(resolvePage('4', 0, 5)).toEqual({
      page: 1,
      perPage: 5,
      totalItems: 0,
      totalPages: 1,
      hasNext: false,
      hasPrevious: false,
    });
  });
});

describe('pageWindow', () => {
  it('skips the items of earlier pages', () => {
    expect(pageWindow(resolvePage('3', 12, 5))).toEqual({ skip: 10, limit: 5 });
  });
});
