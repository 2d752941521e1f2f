import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';
import { getNow } from '../../shared/clock';
import { RATINGS, type Rating, type Review } from '../../shared/types';

export type ReviewInput = Omit<Review, 'id' | 'createdAt' | 'updatedAt'>;

export type ReviewChanges = Partial<Pick<Review, 'rating' | 'comment'>>;

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export const REVIEW_ORDERINGS = ['rating', '-rating', 'created_at', '-created_at', 'updated_at', '-updated_at'] as const;

export type ReviewOrdering = (typeof REVIEW_ORDERINGS)[number];

export interface ReviewFilter {
  clientId?: string;
  barberId?: string;
  barbershopId?: string;
  serviceId?: string;
  rating?: Rating;
  sentiment?: Sentiment;
  ordering?: ReviewOrdering;
}

/** One review per client, barber, service and barbershop. */
export interface DuplicateReview {
  existingId: string;
}

export function sentimentOf(rating: Rating): Sentiment {
  if (rating >= 4) return 'positive';
  if (rating <= 2) return 'negative';
  return 'neutral';
}

export interface ReviewStore {
  list(filter?: ReviewFilter): Promise<Review[]>;
  getById(id: string): Promise<Review | null>;
  create(data: ReviewInput): Promise<Result<Review, DuplicateReview>>;
  update(id: string, changes: ReviewChanges): Promise<Review | null>;
  delete(id: string): Promise<boolean>;
}

function compareBy(ordering: ReviewOrdering): (a: Review, b: Review) => number {
  const descending = ordering.startsWith('-');
  const field = ordering.replace(/^-/, '');
  const value = (r: Review): number =>
    field === 'rating' ? r.rating : field === 'updated_at' ? r.updatedAt : r.createdAt;
  return (a, b) => (descending ? value(b) - value(a) : value(a) - value(b));
}

export class InMemoryReviewStore implements ReviewStore {
  private reviews: Map<string, Review> = new Map();

  async list(filter: ReviewFilter = {}): Promise<Review[]> {
    return [...this.reviews.values()]
      .filter(r => !filter.clientId || r.clientId === filter.clientId)
      .filter(r => !filter.barberId || r.barberId === filter.barberId)
      .filter(r => !filter.barbershopId || r.barbershopId === filter.barbershopId)
      .filter(r => !filter.serviceId || r.serviceId === filter.serviceId)
      .filter(r => filter.rating === undefined || r.rating === filter.rating)
      .filter(r => !filter.sentiment || sentimentOf(r.rating) === filter.sentiment)
      .sort(compareBy(filter.ordering ?? '-created_at'));
  }

  async getById(id: string): Promise<Review | null> {
    return this.reviews.get(id) || null;
  }

  async create(data: ReviewInput): Promise<Result<Review, DuplicateReview>> {
    for (const existing of this.reviews.values()) {
      if (
        existing.clientId === data.clientId &&
        existing.barberId === data.barberId &&
        existing.serviceId === data.serviceId &&
        existing.barbershopId === data.barbershopId
      ) {
        return err({ existingId: existing.id });
      }
    }

    const now = getNow().getTime();
    const review: Review = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };
    this.reviews.set(review.id, review);
    return ok(review);
  }

  async update(id: string, changes: ReviewChanges): Promise<Review | null> {
    const existing = this.reviews.get(id);
    if (!existing) return null;

    const updated: Review = { ...existing, ...changes, updatedAt: getNow().getTime() };
    this.reviews.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.reviews.delete(id);
  }

  reset(): void {
    this.reviews.clear();
  }
}

const RECENT_MS = 7 * 24 * 3600 * 1000;

const round2 = (value: number): number => Math.round(value * 100) / 100;

const percentage = (part: number, total: number): number => (total === 0 ? 0 : round2((part / total) * 100));

export interface RatingSummary {
  totalReviews: number;
  averageRating: number;
  distribution: Record<Rating, number>;
}

export function summarizeRatings(reviews: readonly Review[]): RatingSummary {
  const distribution: Record<Rating, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  let sum = 0;
  for (const review of reviews) {
    distribution[review.rating]++;
    sum += review.rating;
  }
  return {
    totalReviews: reviews.length,
    averageRating: reviews.length === 0 ? 0 : round2(sum / reviews.length),
    distribution,
  };
}

export interface ReviewStatistics extends RatingSummary {
  positive: number;
  negative: number;
  neutral: number;
  withComments: number;
  recent: number;
  percentagePositive: number;
  percentageNegative: number;
  percentageWithComments: number;
}

/** Aggregates over the given reviews; "recent" means created in the last seven days. */
export function reviewStatistics(reviews: readonly Review[], now: Date): ReviewStatistics {
  const summary = summarizeRatings(reviews);
  const count = (predicate: (r: Review) => boolean): number => reviews.filter(predicate).length;

  const positive = count(r => sentimentOf(r.rating) === 'positive');
  const negative = count(r => sentimentOf(r.rating) === 'negative');
  const withComments = count(r => r.comment.trim() !== '');

  return {
    ...summary,
    positive,
    negative,
    neutral: summary.distribution[3],
    withComments,
    recent: count(r => r.createdAt >= now.getTime() - RECENT_MS),
    percentagePositive: percentage(positive, summary.totalReviews),
    percentageNegative: percentage(negative, summary.totalReviews),
    percentageWithComments: percentage(withComments, summary.totalReviews),
  };
}

export interface RankedEntry {
  id: string;
  averageRating: number;
  totalReviews: number;
}

/** Best average first, ties broken by review count; only ids that have reviews appear. */
export function rankByRating(
  reviews: readonly Review[],
  key: (review: Review) => string,
  limit = Infinity,
): RankedEntry[] {
  const groups = new Map<string, Review[]>();
  for (const review of reviews) {
    const id = key(review);
    groups.set(id, [...(groups.get(id) ?? []), review]);
  }

  return [...groups.entries()]
    .map(([id, group]) => {
      const { averageRating, totalReviews } = summarizeRatings(group);
      return { id, averageRating, totalReviews };
    })
    .sort((a, b) => b.averageRating - a.averageRating || b.totalReviews - a.totalReviews)
    .slice(0, limit);
}

export function isRating(value: number): value is Rating {
  return RATINGS.some(rating => rating === value);
}
