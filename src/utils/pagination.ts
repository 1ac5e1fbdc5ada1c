export interface PageInfo {
  page: number;
  perPage: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

const parsePageNumber = (raw: unknown): number | undefined => {
  if (typeof raw === 'number' && Number.isInteger(raw)) return raw;
  if (typeof raw !== 'string' || !/^\s*-?\d+\s*$/.test(raw)) return undefined;
  return parseInt(raw, 10);
};

/**
 * Resolves a requested page against a result count. Anything that is not an
 * integer yields the first page; integers outside the valid range yield the
 * last page. An empty result still has one (empty) page.
 */
export const resolvePage = (
  requested: unknown,
  totalItems: number,
  perPage: number
): PageInfo => {
  const totalPages = Math.max(1, Math.ceil(totalItems / perPage));
  const parsed = parsePageNumber(requested);

  let page: number;
  if (parsed === undefined) {
    page = 1;
  } else if (parsed < 1 || parsed > totalPages) {
    page = totalPages;
  } else {
    page = parsed;
  }

  return {
    page,
    perPage,
    totalItems,
    totalPages,
    hasNext: page < totalPages,
    hasPrevious: page > 1,
  };
};

export const pageWindow = (info: PageInfo): { skip: number; limit: number } => ({
  skip: (info.page - 1) * info.perPage,
  limit: info.perPage,
});
