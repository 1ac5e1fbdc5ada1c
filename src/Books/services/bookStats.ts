import type { BookRecord, BookStatsSnapshot } from '../repositories/book.repository';

export interface ChartSeries {
  labels: string[];
  counts: number[];
}

export interface BookStatsReport {
  total: number;
  maxPages: BookRecord | null;
  minPages: BookRecord | null;
  averagePages: number;
  averageRating: number;
  status: ChartSeries;
  rating: ChartSeries;
}

export const roundTo2 = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * Shapes raw aggregates for the stats dashboard. Missing averages (no books,
 * or no rated books) are reported as 0, and the rating series is always in
 * ascending rating order.
 */
export const buildStatsReport = (snapshot: BookStatsSnapshot): BookStatsReport => {
  const ratingCounts = [...snapshot.ratingCounts].sort((a, b) => a.rating - b.rating);

  return {
    total: snapshot.total,
    maxPages: snapshot.maxPagesBook,
    minPages: snapshot.minPagesBook,
    averagePages: snapshot.averagePages === null ? 0 : roundTo2(snapshot.averagePages),
    averageRating: snapshot.averageRating === null ? 0 : roundTo2(snapshot.averageRating),
    status: {
      labels: snapshot.statusCounts.map((entry) => entry.status),
      counts: snapshot.statusCounts.map((entry) => entry.count),
    },
    rating: {
      labels: ratingCounts.map((entry) => String(entry.rating)),
      counts: ratingCounts.map((entry) => entry.count),
    },
  };
};
