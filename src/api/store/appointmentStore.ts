import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';
import { getNow } from '../../shared/clock';
import { Appointment, AppointmentStatus } from '../../shared/types';

export type AppointmentInput = Omit<Appointment, 'id' | 'status' | 'createdAt' | 'updatedAt'>;

export interface AppointmentFilter {
  clientId?: string;
  barberId?: string;
  barbershopId?: string;
  status?: AppointmentStatus;
  startsFrom?: number;
}

export interface SlotTaken {
  conflictingId: string;
}

// Appointments in these states hold the barber's time
const BLOCKING_STATUSES: readonly AppointmentStatus[] = ['PENDING', 'CONFIRMED'];

export function isBlocking(status: AppointmentStatus): boolean {
  return BLOCKING_STATUSES.includes(status);
}

export interface AppointmentStore {
  list(filter?: AppointmentFilter): Promise<Appointment[]>;
  getById(id: string): Promise<Appointment | null>;
  /** Books the slot unless the barber already holds an overlapping blocking appointment. */
  create(data: AppointmentInput): Promise<Result<Appointment, SlotTaken>>;
  update(id: string, changes: Partial<Pick<Appointment, 'status' | 'notes' | 'finalPrice'>>): Promise<Appointment | null>;
  delete(id: string): Promise<boolean>;
}

export class InMemoryAppointmentStore implements AppointmentStore {
  private appointments: Map<string, Appointment> = new Map();

  async list(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    return [...this.appointments.values()]
      .filter(a => !filter.clientId || a.clientId === filter.clientId)
      .filter(a => !filter.barberId || a.barberId === filter.barberId)
      .filter(a => !filter.barbershopId || a.barbershopId === filter.barbershopId)
      .filter(a => !filter.status || a.status === filter.status)
      .filter(a => filter.startsFrom === undefined || a.startAt >= filter.startsFrom)
      .sort((a, b) => b.startAt - a.startAt);
  }

  async getById(id: string): Promise<Appointment | null> {
    return this.appointments.get(id) || null;
  }

  async create(data: AppointmentInput): Promise<Result<Appointment, SlotTaken>> {
    for (const existing of this.appointments.values()) {
      if (
        existing.barberId === data.barberId &&
        isBlocking(existing.status) &&
        existing.startAt < data.endAt &&
        existing.endAt > data.startAt
      ) {
        return err({ conflictingId: existing.id });
      }
    }

    const now = getNow().getTime();
    const appointment: Appointment = {
      ...data,
      id: uuidv4(),
      status: 'PENDING',
      createdAt: now,
      updatedAt: now,
    };
    this.appointments.set(appointment.id, appointment);
    return ok(appointment);
  }

  async update(
    id: string,
    changes: Partial<Pick<Appointment, 'status' | 'notes' | 'finalPrice'>>,
  ): Promise<Appointment | null> {
    const existing = this.appointments.get(id);
    if (!existing) return null;

    const updated: Appointment = { ...existing, ...changes, updatedAt: getNow().getTime() };
    this.appointments.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.appointments.delete(id);
  }

  reset(): void {
    this.appointments.clear();
  }
}
