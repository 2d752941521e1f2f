import { Router, type Request } from 'express';
import { z } from 'zod';
import {
  decideReviewCreate,
  decideReviewDelete,
  decideReviewStatistics,
  decideReviewUpdate,
  isWithinReviewScope,
  type Requester,
} from '../../auth/accessControl';
import { getNow } from '../../shared/clock';
import { NotFoundError, ValidationError } from '../../shared/errors';
import type { Logger } from '../../shared/logger';
import type { AppointmentStatus, Review } from '../../shared/types';
import { currentUser, requireAuth } from '../middleware/auth';
import { enforce, route } from '../middleware/errors';
import { displayName, serializeReview, serializeReviewStatistics } from '../serializers';
import type { AppointmentStore } from '../store/appointmentStore';
import type { BarbershopStore } from '../store/barbershopStore';
import {
  isRating,
  rankByRating,
  REVIEW_ORDERINGS,
  reviewStatistics,
  SENTIMENTS,
  type RankedEntry,
  type ReviewFilter,
  type ReviewStore,
} from '../store/reviewStore';
import type { UserStore } from '../store/userStore';
import { optionalText, parseInput, requiredString } from '../validation';

// A client may review a visit once it was confirmed or completed
const REVIEWABLE_STATUSES: readonly AppointmentStatus[] = ['CONFIRMED', 'COMPLETED'];

const TOP_RATED_CATEGORIES = ['all', 'barbers', 'services', 'barbershops'] as const;

const rating = z
  .number({ required_error: 'This field is required.', invalid_type_error: 'A valid integer is required.' })
  .int('A valid integer is required.')
  .refine(isRating, 'Rating must be between 1 and 5 stars.');

const createSchema = z.object({
  barber: requiredString(),
  barbershop: requiredString(),
  service: requiredString(),
  rating,
  comment: optionalText(2000).optional(),
});

const updateSchema = z.object({
  rating: rating.optional(),
  comment: optionalText(2000).optional(),
});

const listQuerySchema = z.object({
  rating: z.enum(['1', '2', '3', '4', '5']).transform(Number).refine(isRating).optional(),
  type: z.enum(SENTIMENTS).optional(),
  barber: z.string().optional(),
  service: z.string().optional(),
  barbershop: z.string().optional(),
  ordering: z.enum(REVIEW_ORDERINGS).optional(),
});

const statisticsQuerySchema = z.object({
  barber: z.string().optional(),
  service: z.string().optional(),
  barbershop: z.string().optional(),
});

const topRatedQuerySchema = z.object({
  category: z.enum(TOP_RATED_CATEGORIES).default('all'),
  limit: z.coerce.number().int().min(1).max(50).default(10),
  barbershop: z.string().optional(),
});

type RankedRow<T> = T & { id: string; avg_rating: number; total_reviews: number };

function requester(req: Request): Requester {
  const auth = currentUser(req);
  return { id: auth.sub, role: auth.role };
}

export interface ReviewRouteDeps {
  reviews: ReviewStore;
  appointments: AppointmentStore;
  barbershops: BarbershopStore;
  users: UserStore;
  logger: Logger;
}

export function createReviewRoutes({ reviews, appointments, barbershops, users, logger }: ReviewRouteDeps): Router {
  const router = Router();

  router.use(requireAuth);

  async function ownedBarbershops(caller: Requester): Promise<Set<string>> {
    if (caller.role !== 'BARBER') return new Set();
    const owned = await barbershops.list({ ownerId: caller.id });
    return new Set(owned.map(b => b.id));
  }

  async function listVisible(caller: Requester, filter: ReviewFilter): Promise<Review[]> {
    const owned = await ownedBarbershops(caller);
    const list = await reviews.list(filter);
    return list.filter(r => isWithinReviewScope(caller, r, owned.has(r.barbershopId)));
  }

  // Reviews outside the caller's scope are reported as missing
  async function loadVisible(caller: Requester, id: string): Promise<{ review: Review; ownsBarbershop: boolean }> {
    const review = await reviews.getById(id);
    const ownsBarbershop = review !== null && (await ownedBarbershops(caller)).has(review.barbershopId);
    if (!review || !isWithinReviewScope(caller, review, ownsBarbershop)) {
      throw new NotFoundError('Review');
    }
    return { review, ownsBarbershop };
  }

  async function withDetails<T extends object>(
    ranked: RankedEntry[],
    limit: number,
    load: (id: string) => Promise<T | null>,
  ): Promise<RankedRow<T>[]> {
    const rows: RankedRow<T>[] = [];
    for (const entry of ranked) {
      if (rows.length >= limit) break;
      const details = await load(entry.id);
      if (details) {
        rows.push({ ...details, id: entry.id, avg_rating: entry.averageRating, total_reviews: entry.totalReviews });
      }
    }
    return rows;
  }

  router.get('/', route(async (req, res) => {
    const query = parseInput(listQuerySchema, req.query);

    const list = await listVisible(requester(req), {
      rating: query.rating,
      sentiment: query.type,
      barberId: query.barber,
      serviceId: query.service,
      barbershopId: query.barbershop,
      ordering: query.ordering,
    });
    res.json(list.map(serializeReview));
  }));

  // Clients see what they wrote, barbers what they received
  router.get('/mine', route(async (req, res) => {
    const caller = requester(req);
    const filter: ReviewFilter =
      caller.role === 'CLIENT' ? { clientId: caller.id } : caller.role === 'BARBER' ? { barberId: caller.id } : {};

    const list = await reviews.list(filter);
    res.json(list.map(serializeReview));
  }));

  router.get('/statistics', route(async (req, res) => {
    const caller = requester(req);
    enforce(decideReviewStatistics(caller));
    const { barber, service, barbershop } = parseInput(statisticsQuerySchema, req.query);

    const list = await listVisible(caller, { barberId: barber, serviceId: service, barbershopId: barbershop });
    res.json(serializeReviewStatistics(reviewStatistics(list, getNow())));
  }));

  router.get('/top-rated', route(async (req, res) => {
    enforce(decideReviewStatistics(requester(req)));
    const { category, limit, barbershop } = parseInput(topRatedQuerySchema, req.query);

    const all = await reviews.list(barbershop ? { barbershopId: barbershop } : {});
    const body: Record<string, unknown[]> = {};

    if (category === 'all' || category === 'barbers') {
      body.top_barbers = await withDetails(rankByRating(all, r => r.barberId), limit, async id => {
        const barber = await users.getById(id);
        return barber ? { name: displayName(barber) } : null;
      });
    }

    if (category === 'all' || category === 'services') {
      const shopOfService = new Map(all.map(r => [r.serviceId, r.barbershopId]));
      body.top_services = await withDetails(rankByRating(all, r => r.serviceId), limit, async id => {
        const shopId = shopOfService.get(id);
        const shop = shopId ? await barbershops.getById(shopId) : null;
        const service = shop ? await barbershops.getService(shop.id, id) : null;
        return shop && service ? { name: service.name, price: service.price, barbershop_name: shop.name } : null;
      });
    }

    // Barbershops are only ranked across the whole catalogue
    if ((category === 'all' || category === 'barbershops') && !barbershop) {
      body.top_barbershops = await withDetails(rankByRating(all, r => r.barbershopId), limit, async id => {
        const shop = await barbershops.getById(id);
        return shop ? { name: shop.name, address: shop.address } : null;
      });
    }

    res.json(body);
  }));

  router.post('/', route(async (req, res) => {
    const caller = requester(req);
    enforce(decideReviewCreate(caller));
    const input = parseInput(createSchema, req.body);

    const barbershop = await barbershops.getById(input.barbershop);
    if (!barbershop) {
      throw ValidationError.field('barbershop', 'Invalid barbershop.');
    }

    const service = await barbershops.getService(barbershop.id, input.service);
    if (!service) {
      throw ValidationError.field('service', 'Service does not belong to this barbershop.');
    }

    const barber = await users.getById(input.barber);
    if (!barber || barber.role !== 'BARBER') {
      throw ValidationError.field('barber', 'Selected user is not a barber.');
    }

    const visits = await appointments.list({ clientId: caller.id, barberId: barber.id, barbershopId: barbershop.id });
    if (!visits.some(a => a.serviceId === service.id && REVIEWABLE_STATUSES.includes(a.status))) {
      throw ValidationError.field('non_field_errors', 'You can only review after a confirmed or completed appointment.');
    }

    const result = await reviews.create({
      clientId: caller.id,
      barberId: barber.id,
      barbershopId: barbershop.id,
      serviceId: service.id,
      rating: input.rating,
      comment: input.comment ?? '',
    });
    if (result.isErr()) {
      throw ValidationError.field('non_field_errors', 'You have already reviewed this barber for this service.');
    }

    logger.info('Review created', { reviewId: result.value.id, clientId: caller.id, barbershopId: barbershop.id });
    res.status(201).json(serializeReview(result.value));
  }));

  router.get('/:id', route(async (req, res) => {
    const { review } = await loadVisible(requester(req), req.params.id);
    res.json(serializeReview(review));
  }));

  router.patch('/:id', route(async (req, res) => {
    const caller = requester(req);
    const { review } = await loadVisible(caller, req.params.id);
    enforce(decideReviewUpdate(caller, review));
    const input = parseInput(updateSchema, req.body);

    const updated = await reviews.update(review.id, {
      ...(input.rating !== undefined && { rating: input.rating }),
      ...(input.comment !== undefined && { comment: input.comment }),
    });
    if (!updated) throw new NotFoundError('Review');
    res.json(serializeReview(updated));
  }));

  router.delete('/:id', route(async (req, res) => {
    const caller = requester(req);
    const { review, ownsBarbershop } = await loadVisible(caller, req.params.id);
    enforce(decideReviewDelete(caller, review, ownsBarbershop));

    await reviews.delete(review.id);
    logger.info('Review deleted', { reviewId: review.id, deletedBy: caller.id });
    res.status(204).end();
  }));

  return router;
}
