import { isAdminRole, type Appointment, type Barbershop, type Review, type Role } from '../shared/types';

export type Decision = { allowed: true } | { allowed: false; reason: string };

export interface Requester {
  id: string;
  role: Role;
}

export type UserAction =
  | 'create'
  | 'list'
  | 'retrieve'
  | 'update'
  | 'partial_update'
  | 'destroy'
  | 'bulk_delete'
  | 'change_password';

const ALLOW: Decision = { allowed: true };

const deny = (reason: string): Decision => ({ allowed: false, reason });

/**
 * Per-user decisions are made from the requester and the target id alone,
 * before anything is loaded, so a denial never reveals whether the target
 * exists.
 */
export function decideUserAction(requester: Requester | null, action: UserAction, targetId?: string): Decision {
  if (action === 'create') {
    return ALLOW;
  }

  if (!requester) {
    return deny('Authentication credentials were not provided.');
  }

  const isAdmin = isAdminRole(requester.role);

  switch (action) {
    case 'list':
      // Non-admins get a list narrowed to themselves rather than a denial
      return ALLOW;
    case 'bulk_delete':
      return isAdmin ? ALLOW : deny('Only administrators can bulk delete users.');
    case 'retrieve':
    case 'update':
    case 'partial_update':
    case 'destroy':
    case 'change_password':
      return isAdmin || requester.id === targetId
        ? ALLOW
        : deny("You don't have permission to access other users.");
  }
}

/** Whether a non-admin list request is narrowed to the requester's own record. */
export function listScopedToSelf(requester: Requester): boolean {
  return !isAdminRole(requester.role);
}

export function requiresCurrentPassword(requester: Requester): boolean {
  return !isAdminRole(requester.role);
}

export function decideRoleAssignment(requester: Requester | null, role: Role): Decision {
  if (role !== 'ADMIN' || (requester && isAdminRole(requester.role))) {
    return ALLOW;
  }
  return deny('Only administrators can grant the ADMIN role.');
}

/** Role changes, activation and direct password resets on an existing account. */
export function decideAccountAdministration(requester: Requester | null): Decision {
  return requester && isAdminRole(requester.role) ? ALLOW : deny('Only administrators can change this field.');
}

export function decideBarbershopCreate(requester: Requester): Decision {
  return requester.role === 'BARBER' || isAdminRole(requester.role)
    ? ALLOW
    : deny('Only barbers and administrators can create barbershops.');
}

export function decideBarbershopManage(requester: Requester, barbershop: Barbershop): Decision {
  return isAdminRole(requester.role) || barbershop.ownerId === requester.id
    ? ALLOW
    : deny("You don't have permission to modify this barbershop.");
}

export function decideAppointmentBooking(requester: Requester): Decision {
  return requester.role === 'CLIENT' || isAdminRole(requester.role)
    ? ALLOW
    : deny('Only clients can book appointments.');
}

/**
 * Appointments a requester may see. Out-of-scope appointments are reported
 * as missing.
 */
export function appointmentScope(requester: Requester): { clientId?: string; barberId?: string } {
  switch (requester.role) {
    case 'ADMIN':
      return {};
    case 'BARBER':
      return { barberId: requester.id };
    case 'CLIENT':
      return { clientId: requester.id };
  }
}

export function isWithinAppointmentScope(requester: Requester, appointment: Appointment): boolean {
  const scope = appointmentScope(requester);
  return (
    (scope.clientId === undefined || scope.clientId === appointment.clientId) &&
    (scope.barberId === undefined || scope.barberId === appointment.barberId)
  );
}

export function decideAppointmentUpdate(requester: Requester, appointment: Appointment): Decision {
  return isAdminRole(requester.role) || appointment.barberId === requester.id
    ? ALLOW
    : deny('Only the barber or an administrator can update this appointment.');
}

export function decideAppointmentCancel(requester: Requester, appointment: Appointment): Decision {
  return isAdminRole(requester.role) ||
    appointment.barberId === requester.id ||
    appointment.clientId === requester.id
    ? ALLOW
    : deny("You don't have permission to cancel this appointment.");
}

export function decideAppointmentDelete(requester: Requester): Decision {
  return isAdminRole(requester.role) ? ALLOW : deny('Only administrators can delete appointments.');
}

export function decideReviewCreate(requester: Requester): Decision {
  return requester.role === 'CLIENT' ? ALLOW : deny('Only clients can review services.');
}

/**
 * Reviews a requester may see: administrators all of them, clients the ones
 * they wrote, barbers the ones about them or about a barbershop they own.
 * Out-of-scope reviews are reported as missing.
 */
export function isWithinReviewScope(requester: Requester, review: Review, ownsBarbershop: boolean): boolean {
  switch (requester.role) {
    case 'ADMIN':
      return true;
    case 'BARBER':
      return review.barberId === requester.id || ownsBarbershop;
    case 'CLIENT':
      return review.clientId === requester.id;
  }
}

// Administrators may delete but not rewrite someone else's review
export function decideReviewUpdate(requester: Requester, review: Review): Decision {
  return review.clientId === requester.id ? ALLOW : deny('Only the author can edit this review.');
}

export function decideReviewDelete(requester: Requester, review: Review, ownsBarbershop: boolean): Decision {
  return isAdminRole(requester.role) || review.clientId === requester.id || ownsBarbershop
    ? ALLOW
    : deny("You don't have permission to delete this review.");
}

export function decideReviewStatistics(requester: Requester): Decision {
  return requester.role === 'BARBER' || isAdminRole(requester.role)
    ? ALLOW
    : deny('Only barbers and administrators can view review statistics.');
}
