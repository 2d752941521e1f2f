import { Router } from 'express';
import { z } from 'zod';
import { decideBarbershopCreate, decideBarbershopManage, type Requester } from '../../auth/accessControl';
import { NotFoundError } from '../../shared/errors';
import type { Barbershop } from '../../shared/types';
import { currentUser, requireAuth } from '../middleware/auth';
import { enforce, route } from '../middleware/errors';
import { serializeBarbershop, serializeRatingSummary, serializeService } from '../serializers';
import type { BarbershopStore } from '../store/barbershopStore';
import { summarizeRatings, type ReviewStore } from '../store/reviewStore';
import { optionalText, parseInput, requiredString } from '../validation';

const barbershopSchema = z.object({
  name: requiredString().max(100, 'Ensure this field has no more than 100 characters.'),
  address: requiredString().max(255, 'Ensure this field has no more than 255 characters.'),
  phone: requiredString().max(20, 'Ensure this field has no more than 20 characters.'),
  description: optionalText(2000).optional(),
});

const price = z
  .number({ required_error: 'This field is required.', invalid_type_error: 'A valid number is required.' })
  .nonnegative('Ensure this value is greater than or equal to 0.')
  .refine(value => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, {
    message: 'Ensure that there are no more than 2 decimal places.',
  });

const serviceSchema = z.object({
  name: requiredString().max(100, 'Ensure this field has no more than 100 characters.'),
  description: optionalText(2000).optional(),
  price,
  duration: z
    .number({ required_error: 'This field is required.', invalid_type_error: 'A valid integer is required.' })
    .int('A valid integer is required.')
    .positive('Ensure this value is greater than 0.'),
});

const listQuerySchema = z.object({
  owner: z.string().optional(),
  search: z.string().optional(),
});

function requester(auth: { sub: string; role: Requester['role'] }): Requester {
  return { id: auth.sub, role: auth.role };
}

export interface BarbershopRouteDeps {
  barbershops: BarbershopStore;
  reviews: ReviewStore;
}

export function createBarbershopRoutes({ barbershops, reviews }: BarbershopRouteDeps): Router {
  const router = Router();

  async function loadBarbershop(id: string): Promise<Barbershop> {
    const barbershop = await barbershops.getById(id);
    if (!barbershop) {
      throw new NotFoundError('Barbershop');
    }
    return barbershop;
  }

  // Listing and reading are public
  router.get('/', route(async (req, res) => {
    const { owner, search } = parseInput(listQuerySchema, req.query);
    const list = await barbershops.list({ ownerId: owner, search });
    res.json(list.map(serializeBarbershop));
  }));

  router.post('/', requireAuth, route(async (req, res) => {
    const caller = requester(currentUser(req));
    enforce(decideBarbershopCreate(caller));
    const input = parseInput(barbershopSchema, req.body);

    const barbershop = await barbershops.create({
      name: input.name,
      address: input.address,
      phone: input.phone,
      description: input.description ?? '',
      ownerId: caller.id,
    });
    res.status(201).json(serializeBarbershop(barbershop));
  }));

  router.get('/:id', route(async (req, res) => {
    res.json(serializeBarbershop(await loadBarbershop(req.params.id)));
  }));

  router.put('/:id', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));
    const input = parseInput(barbershopSchema, req.body);

    const updated = await barbershops.update(barbershop.id, { ...input, description: input.description ?? '' });
    if (!updated) throw new NotFoundError('Barbershop');
    res.json(serializeBarbershop(updated));
  }));

  router.patch('/:id', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));
    const input = parseInput(barbershopSchema.partial(), req.body);

    const updated = await barbershops.update(barbershop.id, input);
    if (!updated) throw new NotFoundError('Barbershop');
    res.json(serializeBarbershop(updated));
  }));

  router.delete('/:id', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));

    await barbershops.delete(barbershop.id);
    res.status(204).end();
  }));

  // Public rating summary, built from the barbershop's reviews
  router.get('/:id/rating', route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    const list = await reviews.list({ barbershopId: barbershop.id });
    res.json({ barbershop: barbershop.id, ...serializeRatingSummary(summarizeRatings(list)) });
  }));

  // Services offered by a barbershop
  router.get('/:id/services', route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    const services = await barbershops.listServices(barbershop.id);
    res.json(services.map(serializeService));
  }));

  router.post('/:id/services', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));
    const input = parseInput(serviceSchema, req.body);

    const service = await barbershops.createService(barbershop.id, {
      name: input.name,
      description: input.description ?? '',
      price: input.price,
      durationMinutes: input.duration,
    });
    res.status(201).json(serializeService(service));
  }));

  router.patch('/:id/services/:serviceId', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));
    const input = parseInput(serviceSchema.partial(), req.body);

    const updated = await barbershops.updateService(barbershop.id, req.params.serviceId, {
      ...(input.name !== undefined && { name: input.name }),
      ...(input.description !== undefined && { description: input.description }),
      ...(input.price !== undefined && { price: input.price }),
      ...(input.duration !== undefined && { durationMinutes: input.duration }),
    });
    if (!updated) throw new NotFoundError('Service');
    res.json(serializeService(updated));
  }));

  router.delete('/:id/services/:serviceId', requireAuth, route(async (req, res) => {
    const barbershop = await loadBarbershop(req.params.id);
    enforce(decideBarbershopManage(requester(currentUser(req)), barbershop));

    if (!(await barbershops.deleteService(barbershop.id, req.params.serviceId))) {
      throw new NotFoundError('Service');
    }
    res.status(204).end();
  }));

  return router;
}
