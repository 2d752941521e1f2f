import { v4 as uuidv4 } from 'uuid';
import { getNow } from '../../shared/clock';
import { Barbershop, Service } from '../../shared/types';

export type BarbershopInput = Omit<Barbershop, 'id' | 'createdAt' | 'updatedAt'>;
export type ServiceInput = Omit<Service, 'id' | 'barbershopId' | 'createdAt' | 'updatedAt'>;

export interface BarbershopStore {
  list(filter?: { ownerId?: string; search?: string }): Promise<Barbershop[]>;
  getById(id: string): Promise<Barbershop | null>;
  create(data: BarbershopInput): Promise<Barbershop>;
  update(id: string, changes: Partial<BarbershopInput>): Promise<Barbershop | null>;
  delete(id: string): Promise<boolean>;

  listServices(barbershopId: string): Promise<Service[]>;
  getService(barbershopId: string, serviceId: string): Promise<Service | null>;
  createService(barbershopId: string, data: ServiceInput): Promise<Service>;
  updateService(barbershopId: string, serviceId: string, changes: Partial<ServiceInput>): Promise<Service | null>;
  deleteService(barbershopId: string, serviceId: string): Promise<boolean>;
}

export class InMemoryBarbershopStore implements BarbershopStore {
  private barbershops: Map<string, Barbershop> = new Map();
  private services: Map<string, Service> = new Map();

  async list(filter: { ownerId?: string; search?: string } = {}): Promise<Barbershop[]> {
    const needle = filter.search?.toLowerCase();
    return [...this.barbershops.values()]
      .filter(b => !filter.ownerId || b.ownerId === filter.ownerId)
      .filter(b => !needle || b.name.toLowerCase().includes(needle) || b.address.toLowerCase().includes(needle))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getById(id: string): Promise<Barbershop | null> {
    return this.barbershops.get(id) || null;
  }

  async create(data: BarbershopInput): Promise<Barbershop> {
    const now = getNow().getTime();
    const barbershop: Barbershop = { ...data, id: uuidv4(), createdAt: now, updatedAt: now };
    this.barbershops.set(barbershop.id, barbershop);
    return barbershop;
  }

  async update(id: string, changes: Partial<BarbershopInput>): Promise<Barbershop | null> {
    const existing = this.barbershops.get(id);
    if (!existing) return null;

    const updated: Barbershop = { ...existing, ...changes, updatedAt: getNow().getTime() };
    this.barbershops.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.barbershops.delete(id)) return false;

    // Services belong to their barbershop
    for (const service of [...this.services.values()]) {
      if (service.barbershopId === id) this.services.delete(service.id);
    }
    return true;
  }

  async listServices(barbershopId: string): Promise<Service[]> {
    return [...this.services.values()]
      .filter(s => s.barbershopId === barbershopId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getService(barbershopId: string, serviceId: string): Promise<Service | null> {
    const service = this.services.get(serviceId);
    return service && service.barbershopId === barbershopId ? service : null;
  }

  async createService(barbershopId: string, data: ServiceInput): Promise<Service> {
    const now = getNow().getTime();
    const service: Service = { ...data, id: uuidv4(), barbershopId, createdAt: now, updatedAt: now };
    this.services.set(service.id, service);
    return service;
  }

  async updateService(
    barbershopId: string,
    serviceId: string,
    changes: Partial<ServiceInput>,
  ): Promise<Service | null> {
    const existing = await this.getService(barbershopId, serviceId);
    if (!existing) return null;

    const updated: Service = { ...existing, ...changes, updatedAt: getNow().getTime() };
    this.services.set(serviceId, updated);
    return updated;
  }

  async deleteService(barbershopId: string, serviceId: string): Promise<boolean> {
    const existing = await this.getService(barbershopId, serviceId);
    if (!existing) return false;
    return this.services.delete(serviceId);
  }

  reset(): void {
    this.barbershops.clear();
    this.services.clear();
  }
}
