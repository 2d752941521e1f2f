import { Router, type Request } from 'express';
import { z } from 'zod';
import {
  appointmentScope,
  decideAppointmentBooking,
  decideAppointmentCancel,
  decideAppointmentDelete,
  decideAppointmentUpdate,
  isWithinAppointmentScope,
  type Requester,
} from '../../auth/accessControl';
import { getNow } from '../../shared/clock';
import { NotFoundError, ValidationError } from '../../shared/errors';
import type { Logger } from '../../shared/logger';
import { APPOINTMENT_STATUSES, isAdminRole, type Appointment, type AppointmentStatus } from '../../shared/types';
import { currentUser, requireAuth } from '../middleware/auth';
import { enforce, route } from '../middleware/errors';
import { serializeAppointment } from '../serializers';
import type { AppointmentStore } from '../store/appointmentStore';
import type { BarbershopStore } from '../store/barbershopStore';
import type { UserStore } from '../store/userStore';
import { isoDateTime, optionalText, parseInput, requiredString } from '../validation';

const UPCOMING_LIMIT = 10;

const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  PENDING: ['CONFIRMED', 'CANCELLED'],
  CONFIRMED: ['COMPLETED', 'CANCELLED'],
  COMPLETED: [],
  CANCELLED: [],
};

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

const finalPrice = z
  .number({ invalid_type_error: 'A valid number is required.' })
  .nonnegative('Ensure this value is greater than or equal to 0.');

const bookingSchema = z.object({
  client: z.string({ invalid_type_error: 'Not a valid string.' }).optional(),
  barber: requiredString(),
  barbershop: requiredString(),
  service: requiredString(),
  start_datetime: isoDateTime(),
  end_datetime: isoDateTime().optional(),
  notes: optionalText(2000).optional(),
});

const updateSchema = z.object({
  status: z.enum(APPOINTMENT_STATUSES, { invalid_type_error: 'Not a valid choice.' }).optional(),
  notes: optionalText(2000).optional(),
  final_price: finalPrice.optional(),
});

const listQuerySchema = z.object({
  status: z.enum(APPOINTMENT_STATUSES).optional(),
  barbershop: z.string().optional(),
});

function requester(req: Request): Requester {
  const auth = currentUser(req);
  return { id: auth.sub, role: auth.role };
}

export interface AppointmentRouteDeps {
  appointments: AppointmentStore;
  barbershops: BarbershopStore;
  users: UserStore;
  logger: Logger;
}

export function createAppointmentRoutes({ appointments, barbershops, users, logger }: AppointmentRouteDeps): Router {
  const router = Router();

  router.use(requireAuth);

  // Appointments outside the caller's scope are reported as missing
  async function loadVisible(caller: Requester, id: string): Promise<Appointment> {
    const appointment = await appointments.getById(id);
    if (!appointment || !isWithinAppointmentScope(caller, appointment)) {
      throw new NotFoundError('Appointment');
    }
    return appointment;
  }

  router.get('/', route(async (req, res) => {
    const caller = requester(req);
    const { status, barbershop } = parseInput(listQuerySchema, req.query);

    const list = await appointments.list({ ...appointmentScope(caller), status, barbershopId: barbershop });
    res.json(list.map(serializeAppointment));
  }));

  router.get('/upcoming', route(async (req, res) => {
    const caller = requester(req);

    const list = await appointments.list({ ...appointmentScope(caller), startsFrom: getNow().getTime() });
    const upcoming = list
      .filter(a => a.status === 'PENDING' || a.status === 'CONFIRMED')
      .sort((a, b) => a.startAt - b.startAt)
      .slice(0, UPCOMING_LIMIT);
    res.json(upcoming.map(serializeAppointment));
  }));

  router.post('/', route(async (req, res) => {
    const caller = requester(req);
    enforce(decideAppointmentBooking(caller));
    const input = parseInput(bookingSchema, req.body);

    const clientId = isAdminRole(caller.role) && input.client ? input.client : caller.id;
    if (clientId !== caller.id) {
      const client = await users.getById(clientId);
      if (!client || !client.isActive) {
        throw ValidationError.field('client', 'Invalid client.');
      }
    }

    const barbershop = await barbershops.getById(input.barbershop);
    if (!barbershop) {
      throw ValidationError.field('barbershop', 'Invalid barbershop.');
    }

    const service = await barbershops.getService(barbershop.id, input.service);
    if (!service) {
      throw ValidationError.field('service', 'Service does not belong to this barbershop.');
    }

    const barber = await users.getById(input.barber);
    if (!barber || barber.role !== 'BARBER' || !barber.isActive) {
      throw ValidationError.field('barber', 'Selected user is not an active barber.');
    }

    const startAt = input.start_datetime;
    const endAt = input.end_datetime ?? startAt + service.durationMinutes * 60_000;
    if (endAt <= startAt) {
      throw ValidationError.field('non_field_errors', 'End time must be after start time');
    }

    const result = await appointments.create({
      clientId,
      barberId: barber.id,
      barbershopId: barbershop.id,
      serviceId: service.id,
      startAt,
      endAt,
      finalPrice: service.price,
      notes: input.notes ?? '',
    });
    if (result.isErr()) {
      throw ValidationError.field('non_field_errors', 'Barber is not available at this time.');
    }

    logger.info('Appointment booked', { appointmentId: result.value.id, clientId, barberId: barber.id });
    res.status(201).json(serializeAppointment(result.value));
  }));

  router.get('/:id', route(async (req, res) => {
    res.json(serializeAppointment(await loadVisible(requester(req), req.params.id)));
  }));

  router.patch('/:id', route(async (req, res) => {
    const caller = requester(req);
    const appointment = await loadVisible(caller, req.params.id);
    enforce(decideAppointmentUpdate(caller, appointment));
    const input = parseInput(updateSchema, req.body);

    if (input.status !== undefined && !canTransition(appointment.status, input.status)) {
      throw ValidationError.field('status', `Cannot change status from ${appointment.status} to ${input.status}.`);
    }

    const updated = await appointments.update(appointment.id, {
      ...(input.status !== undefined && { status: input.status }),
      ...(input.notes !== undefined && { notes: input.notes }),
      ...(input.final_price !== undefined && { finalPrice: input.final_price }),
    });
    if (!updated) throw new NotFoundError('Appointment');
    res.json(serializeAppointment(updated));
  }));

  router.post('/:id/cancel', route(async (req, res) => {
    const caller = requester(req);
    const appointment = await loadVisible(caller, req.params.id);
    enforce(decideAppointmentCancel(caller, appointment));

    if (!TRANSITIONS[appointment.status].includes('CANCELLED')) {
      throw ValidationError.field('status', `Cannot cancel an appointment that is ${appointment.status}.`);
    }

    const updated = await appointments.update(appointment.id, { status: 'CANCELLED' });
    if (!updated) throw new NotFoundError('Appointment');
    logger.info('Appointment cancelled', { appointmentId: updated.id, cancelledBy: caller.id });
    res.json(serializeAppointment(updated));
  }));

  router.delete('/:id', route(async (req, res) => {
    const caller = requester(req);
    enforce(decideAppointmentDelete(caller));

    if (!(await appointments.delete(req.params.id))) {
      throw new NotFoundError('Appointment');
    }
    res.status(204).end();
  }));

  return router;
}
