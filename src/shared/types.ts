export const ROLES = ['CLIENT', 'BARBER', 'ADMIN'] as const;

export type Role = (typeof ROLES)[number];

export function isAdminRole(role: Role): boolean {
  return role === 'ADMIN';
}

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  phone: string;
  bio: string;
  role: Role;
  isActive: boolean;
  createdAt: number; // Unix ms
  updatedAt: number;
}

export type NewUser = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;

export type UserChanges = Partial<Omit<User, 'id' | 'createdAt' | 'updatedAt'>>;

export interface UserQuery {
  role?: Role;
  search?: string;
  ordering?: UserOrdering;
}

export type UserOrdering = 'username' | '-username' | 'date_joined' | '-date_joined';

// Authenticated caller, as established by the access token
export interface AuthContext {
  sub: string;
  role: Role;
  jti: string;
}

export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
  sub: string;
  tokenType: TokenType;
  jti: string;
  issuedAt: number; // Unix seconds
  expiresAt: number; // Unix seconds
  role?: Role; // access tokens only
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface Barbershop {
  id: string;
  name: string;
  address: string;
  phone: string;
  ownerId: string;
  description: string;
  createdAt: number;
  updatedAt: number;
}

export interface Service {
  id: string;
  barbershopId: string;
  name: string;
  description: string;
  price: number;
  durationMinutes: number;
  createdAt: number;
  updatedAt: number;
}

export const APPOINTMENT_STATUSES = ['PENDING', 'CONFIRMED', 'COMPLETED', 'CANCELLED'] as const;

export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export interface Appointment {
  id: string;
  clientId: string;
  barberId: string;
  barbershopId: string;
  serviceId: string;
  startAt: number; // Unix ms
  endAt: number;
  status: AppointmentStatus;
  finalPrice: number;
  notes: string;
  createdAt: number;
  updatedAt: number;
}

export const RATINGS = [1, 2, 3, 4, 5] as const;

export type Rating = (typeof RATINGS)[number];

export interface Review {
  id: string;
  clientId: string;
  barberId: string;
  barbershopId: string;
  serviceId: string;
  rating: Rating;
  comment: string;
  createdAt: number;
  updatedAt: number;
}
