import { isAdminRole, type Appointment, type Barbershop, type Review, type Service, type User } from '../shared/types';
import type { RatingSummary, ReviewStatistics } from './store/reviewStore';

const iso = (ms: number): string => new Date(ms).toISOString();

// Privilege flags are derived from the role and never stored
export function serializeUser(user: User) {
  const isAdmin = isAdminRole(user.role);
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    phone: user.phone,
    bio: user.bio,
    role: user.role,
    is_active: user.isActive,
    is_staff: isAdmin,
    is_superuser: isAdmin,
    date_joined: iso(user.createdAt),
    created_at: iso(user.createdAt),
    updated_at: iso(user.updatedAt),
  };
}

export function serializeLoginUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    first_name: user.firstName,
    last_name: user.lastName,
  };
}

export function serializeBarbershop(barbershop: Barbershop) {
  return {
    id: barbershop.id,
    name: barbershop.name,
    address: barbershop.address,
    phone: barbershop.phone,
    owner: barbershop.ownerId,
    description: barbershop.description,
    created_at: iso(barbershop.createdAt),
    updated_at: iso(barbershop.updatedAt),
  };
}

export function serializeService(service: Service) {
  return {
    id: service.id,
    barbershop: service.barbershopId,
    name: service.name,
    description: service.description,
    price: service.price,
    duration: service.durationMinutes,
    created_at: iso(service.createdAt),
    updated_at: iso(service.updatedAt),
  };
}

export function serializeAppointment(appointment: Appointment) {
  return {
    id: appointment.id,
    client: appointment.clientId,
    barber: appointment.barberId,
    barbershop: appointment.barbershopId,
    service: appointment.serviceId,
    start_datetime: iso(appointment.startAt),
    end_datetime: iso(appointment.endAt),
    status: appointment.status,
    final_price: appointment.finalPrice,
    notes: appointment.notes,
    created_at: iso(appointment.createdAt),
    updated_at: iso(appointment.updatedAt),
  };
}

export function displayName(user: User): string {
  return `${user.firstName} ${user.lastName}`.trim() || user.username;
}

export function serializeReview(review: Review) {
  return {
    id: review.id,
    client: review.clientId,
    barber: review.barberId,
    barbershop: review.barbershopId,
    service: review.serviceId,
    rating: review.rating,
    comment: review.comment,
    created_at: iso(review.createdAt),
    updated_at: iso(review.updatedAt),
  };
}

export function serializeRatingSummary(summary: RatingSummary) {
  return {
    total_reviews: summary.totalReviews,
    average_rating: summary.averageRating,
    rating_distribution: summary.distribution,
  };
}

export function serializeReviewStatistics(stats: ReviewStatistics) {
  return {
    ...serializeRatingSummary(stats),
    positive_reviews: stats.positive,
    negative_reviews: stats.negative,
    neutral_reviews: stats.neutral,
    reviews_with_comments: stats.withComments,
    recent_reviews: stats.recent,
    percentage_positive: stats.percentagePositive,
    percentage_negative: stats.percentageNegative,
    percentage_with_comments: stats.percentageWithComments,
  };
}
