// utils/formatReview.ts
import { ReviewRecord } from '../repositories/types';

export interface ReviewResponse {
  id: string;
  name: string;
  location: string;
  rating: number;
  favorite: boolean;
  review: string | null;
  createdAt: string;
  updatedAt: string;
}

// The deleted flag stays internal: callers only ever see live reviews.
export function formatReview(review: ReviewRecord): ReviewResponse {
  return {
    id: review.id,
    name: review.name,
    location: review.location,
    rating: review.rating,
    favorite: review.favorite,
    review: review.review ?? null,
    createdAt: review.createdAt.toISOString(),
    updatedAt: review.updatedAt.toISOString(),
  };
}
