import {
  appointmentScope,
  decideAccountAdministration,
  decideAppointmentBooking,
  decideAppointmentCancel,
  decideAppointmentUpdate,
  decideBarbershopManage,
  decideReviewCreate,
  decideReviewDelete,
  decideReviewStatistics,
  decideReviewUpdate,
  decideRoleAssignment,
  decideUserAction,
  isWithinAppointmentScope,
  isWithinReviewScope,
  type Requester,
  type UserAction,
} from '../auth/accessControl';
import type { Appointment, Barbershop, Review } from '../shared/types';

const admin: Requester = { id: 'admin-1', role: 'ADMIN' };
const client: Requester = { id: 'client-1', role: 'CLIENT' };
const barber: Requester = { id: 'barber-1', role: 'BARBER' };

const appointment: Appointment = {
  id: 'appt-1',
  clientId: 'client-1',
  barberId: 'barber-1',
  barbershopId: 'shop-1',
  serviceId: 'service-1',
  startAt: 0,
  endAt: 1_800_000,
  status: 'PENDING',
  finalPrice: 25,
  notes: '',
  createdAt: 0,
  updatedAt: 0,
};

const review: Review = {
  id: 'review-1',
  clientId: 'client-1',
  barberId: 'barber-1',
  barbershopId: 'shop-1',
  serviceId: 'service-1',
  rating: 4,
  comment: '',
  createdAt: 0,
  updatedAt: 0,
};

describe('access control', () => {
  describe('user actions', () => {
    const perUser: UserAction[] = ['retrieve', 'update', 'partial_update', 'destroy', 'change_password'];

    test.each(perUser)('%s: self and admin allowed, others denied', action => {
      expect(decideUserAction(client, action, 'client-1').allowed).toBe(true);
      expect(decideUserAction(admin, action, 'client-1').allowed).toBe(true);
      expect(decideUserAction(barber, action, 'client-1')).toEqual({
        allowed: false,
        reason: "You don't have permission to access other users.",
      });
    });

    test('anonymous callers may only create', () => {
      expect(decideUserAction(null, 'create').allowed).toBe(true);
      expect(decideUserAction(null, 'list').allowed).toBe(false);
      expect(decideUserAction(null, 'retrieve', 'client-1').allowed).toBe(false);
    });

    test('list is never denied to an authenticated caller', () => {
      expect(decideUserAction(client, 'list').allowed).toBe(true);
      expect(decideUserAction(barber, 'list').allowed).toBe(true);
    });

    test('bulk delete is admin only', () => {
      expect(decideUserAction(admin, 'bulk_delete').allowed).toBe(true);
      expect(decideUserAction(barber, 'bulk_delete').allowed).toBe(false);
    });
  });

  describe('role assignment', () => {
    test('non-admin roles can be chosen by anyone', () => {
      expect(decideRoleAssignment(null, 'CLIENT').allowed).toBe(true);
      expect(decideRoleAssignment(null, 'BARBER').allowed).toBe(true);
    });

    test('ADMIN only by an admin', () => {
      expect(decideRoleAssignment(null, 'ADMIN').allowed).toBe(false);
      expect(decideRoleAssignment(barber, 'ADMIN').allowed).toBe(false);
      expect(decideRoleAssignment(admin, 'ADMIN').allowed).toBe(true);
    });

    test('account administration is admin only', () => {
      expect(decideAccountAdministration(admin).allowed).toBe(true);
      expect(decideAccountAdministration(client).allowed).toBe(false);
      expect(decideAccountAdministration(null).allowed).toBe(false);
    });
  });

  describe('barbershops', () => {
    const shop: Barbershop = {
      id: 'shop-1',
      name: 'Sharp Cuts',
      address: '1 Main Street',
      phone: '555-0101',
      ownerId: 'barber-1',
      description: '',
      createdAt: 0,
      updatedAt: 0,
    };

    test('owner and admin manage, other barbers do not', () => {
      expect(decideBarbershopManage(barber, shop).allowed).toBe(true);
      expect(decideBarbershopManage(admin, shop).allowed).toBe(true);
      expect(decideBarbershopManage({ id: 'barber-2', role: 'BARBER' }, shop).allowed).toBe(false);
    });
  });

  describe('appointments', () => {
    test('scope follows the role', () => {
      expect(appointmentScope(admin)).toEqual({});
      expect(appointmentScope(barber)).toEqual({ barberId: 'barber-1' });
      expect(appointmentScope(client)).toEqual({ clientId: 'client-1' });
    });

    test('visibility', () => {
      expect(isWithinAppointmentScope(client, appointment)).toBe(true);
      expect(isWithinAppointmentScope(barber, appointment)).toBe(true);
      expect(isWithinAppointmentScope(admin, appointment)).toBe(true);
      expect(isWithinAppointmentScope({ id: 'client-2', role: 'CLIENT' }, appointment)).toBe(false);
      // A barber who booked is still judged as a barber
      expect(isWithinAppointmentScope({ id: 'client-1', role: 'BARBER' }, appointment)).toBe(false);
    });

    test('booking, updating and cancelling', () => {
      expect(decideAppointmentBooking(client).allowed).toBe(true);
      expect(decideAppointmentBooking(barber).allowed).toBe(false);

      expect(decideAppointmentUpdate(barber, appointment).allowed).toBe(true);
      expect(decideAppointmentUpdate(client, appointment).allowed).toBe(false);

      expect(decideAppointmentCancel(client, appointment).allowed).toBe(true);
      expect(decideAppointmentCancel(barber, appointment).allowed).toBe(true);
      expect(decideAppointmentCancel({ id: 'client-2', role: 'CLIENT' }, appointment).allowed).toBe(false);
    });
  });

  describe('reviews', () => {
    const otherBarber: Requester = { id: 'barber-2', role: 'BARBER' };

    test('only clients write reviews', () => {
      expect(decideReviewCreate(client).allowed).toBe(true);
      expect(decideReviewCreate(barber).allowed).toBe(false);
      expect(decideReviewCreate(admin).allowed).toBe(false);
    });

    test('scope: author, reviewed barber, barbershop owner and admin', () => {
      expect(isWithinReviewScope(client, review, false)).toBe(true);
      expect(isWithinReviewScope({ id: 'client-2', role: 'CLIENT' }, review, false)).toBe(false);
      expect(isWithinReviewScope(barber, review, false)).toBe(true);
      expect(isWithinReviewScope(otherBarber, review, false)).toBe(false);
      expect(isWithinReviewScope(otherBarber, review, true)).toBe(true);
      expect(isWithinReviewScope(admin, review, false)).toBe(true);
    });

    test('only the author edits', () => {
      expect(decideReviewUpdate(client, review).allowed).toBe(true);
      expect(decideReviewUpdate(admin, review)).toEqual({ allowed: false, reason: 'Only the author can edit this review.' });
    });

    test('the author, the barbershop owner and admins delete', () => {
      expect(decideReviewDelete(client, review, false).allowed).toBe(true);
      expect(decideReviewDelete(admin, review, false).allowed).toBe(true);
      expect(decideReviewDelete(otherBarber, review, true).allowed).toBe(true);
      expect(decideReviewDelete(barber, review, false).allowed).toBe(false);
    });

    test('statistics are for barbers and admins', () => {
      expect(decideReviewStatistics(barber).allowed).toBe(true);
      expect(decideReviewStatistics(admin).allowed).toBe(true);
      expect(decideReviewStatistics(client).allowed).toBe(false);
    });
  });
});
