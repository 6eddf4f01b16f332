import { allowedLocations, isAllowedLocation } from './bucketing';
import { ReviewRecord, ReviewRepository } from '../repositories/types';
import { AppError, ErrorKind, invalidInput, notFound } from '../utils/errors';

function assertRating(rating: unknown): asserts rating is number {
  if (typeof rating !== 'number' || !Number.isInteger(rating)) {
    throw invalidInput(`Invalid rating: ${String(rating)}. Rating must be an integer from 1-5.`);
  }
  if (rating < 1 || rating > 5) {
    throw invalidInput(`Invalid number: ${rating}. Rating must be from 1-5.`);
  }
}

function assertFavorite(favorite: unknown): asserts favorite is boolean {
  if (typeof favorite !== 'boolean') {
    throw invalidInput('Favorite status must be a boolean value (true or false).');
  }
}

function assertReviewText(text: unknown): asserts text is string | null | undefined {
  if (text !== undefined && text !== null && typeof text !== 'string') {
    throw invalidInput('Review text must be a string.');
  }
}

// Updates must name the new text; clearing it takes an explicit null.
function assertUpdatedText(text: unknown): asserts text is string | null {
  if (text !== null && typeof text !== 'string') {
    throw invalidInput('Review text must be a string or null');
  }
}

function requireId(id: unknown): string {
  if (typeof id !== 'string' || !id.trim()) {
    throw invalidInput('Review ID is required');
  }
  return id.trim();
}

/**
 * Validated access to reviews. Every check runs before the repository is
 * touched, and every mutation goes through the repository's conditional
 * write on live records, so a deleted review can never be changed again.
 */
export class ReviewStore {
  constructor(private readonly repository: ReviewRepository) {}

  async create(
    name: unknown,
    location: unknown,
    rating: unknown,
    favorite: unknown,
    reviewText?: unknown
  ): Promise<ReviewRecord> {
    if (typeof name !== 'string' || !name.trim()) {
      throw invalidInput('Name is required');
    }
    assertRating(rating);
    if (typeof location !== 'string' || !isAllowedLocation(location)) {
      throw invalidInput(
        `Invalid location: ${String(location)}. Must be a restaurant from the following: ${allowedLocations().join(', ')}`
      );
    }
    assertFavorite(favorite);
    assertReviewText(reviewText);

    const record = await this.repository.insert({
      name: name.trim(),
      location,
      rating,
      favorite,
      review: reviewText ?? null,
    });
    console.info('Review successfully added: %s (id %s)', record.name, record.id);
    return record;
  }

  async getById(id: unknown): Promise<ReviewRecord> {
    const reviewId = requireId(id);
    const record = await this.repository.findById(reviewId);
    if (!record || record.deleted) {
      throw notFound(`Review with ID ${reviewId} not found`);
    }
    return record;
  }

  async getByName(name: unknown): Promise<ReviewRecord> {
    if (typeof name !== 'string' || !name.trim()) {
      throw invalidInput('Name is required');
    }
    const record = await this.repository.findLiveByName(name.trim());
    if (!record) {
      throw notFound(`Review with name ${name.trim()} not found`);
    }
    return record;
  }

  async delete(id: unknown): Promise<void> {
    const reviewId = requireId(id);
    const deleted = await this.repository.markDeleted(reviewId);
    if (deleted) {
      console.info('Review with ID %s marked as deleted.', reviewId);
      return;
    }

    const existing = await this.repository.findById(reviewId);
    if (!existing) {
      throw notFound(`Review with ID ${reviewId} not found`);
    }
    throw new AppError(ErrorKind.ALREADY_DELETED, `Review with ID ${reviewId} has already been deleted`);
  }

  async updateReviewText(id: unknown, text: unknown): Promise<ReviewRecord> {
    const reviewId = requireId(id);
    assertUpdatedText(text);
    const updated = await this.repository.updateLive(reviewId, { review: text });
    if (!updated) {
      throw notFound(`Review with ID ${reviewId} not found`);
    }
    console.info('Updated review text for ID %s.', reviewId);
    return updated;
  }

  async updateRating(id: unknown, rating: unknown): Promise<ReviewRecord> {
    const reviewId = requireId(id);
    assertRating(rating);
    const updated = await this.repository.updateLive(reviewId, { rating });
    if (!updated) {
      throw notFound(`Review with ID ${reviewId} not found`);
    }
    console.info('Updated rating for ID %s to %d.', reviewId, rating);
    return updated;
  }

  async updateFavorite(id: unknown, isFavorite: unknown): Promise<ReviewRecord> {
    const reviewId = requireId(id);
    assertFavorite(isFavorite);
    const updated = await this.repository.updateLive(reviewId, { favorite: isFavorite });
    if (!updated) {
      throw notFound(`Review with ID ${reviewId} not found`);
    }
    console.info('Updated favorite status for ID %s to %s.', reviewId, isFavorite);
    return updated;
  }

  async listFavorites(): Promise<ReviewRecord[]> {
    const favorites = await this.repository.list({ favorite: true });
    console.info('Retrieved %d favorite reviews.', favorites.length);
    return favorites;
  }

  async listReviews(): Promise<ReviewRecord[]> {
    return this.repository.list();
  }

  /** Removes every review, deleted or not. Administrative/test reset only. */
  async clearAll(): Promise<void> {
    await this.repository.clear();
    console.info('Reviews cleared successfully.');
  }
}
