export interface ReviewRecord {
  id: string;
  name: string;
  location: string;
  rating: number;
  favorite: boolean;
  review: string | null;
  deleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewReview {
  name: string;
  location: string;
  rating: number;
  favorite: boolean;
  review: string | null;
}

export type ReviewChanges = Partial<Pick<ReviewRecord, 'rating' | 'favorite' | 'review'>>;

export interface ReviewListFilter {
  favorite?: boolean;
}

/**
 * Persistence backend for reviews. Implementations must make `updateLive` and
 * `markDeleted` single conditional writes on `deleted = false`, and reject a
 * duplicate name on insert with a CONFLICT AppError.
 */
export interface ReviewRepository {
  insert(review: NewReview): Promise<ReviewRecord>;
  /** Includes soft-deleted records. */
  findById(id: string): Promise<ReviewRecord | null>;
  findLiveByName(name: string): Promise<ReviewRecord | null>;
  /** Live records only, oldest first. */
  list(filter?: ReviewListFilter): Promise<ReviewRecord[]>;
  /** Returns null when no live record has this id. */
  updateLive(id: string, changes: ReviewChanges): Promise<ReviewRecord | null>;
  /** Returns null when no live record has this id. */
  markDeleted(id: string): Promise<ReviewRecord | null>;
  clear(): Promise<void>;
}

export interface UserRecord {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
}

export interface UserRepository {
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Rejects a duplicate username with a CONFLICT AppError. */
  create(user: { username: string; passwordHash: string }): Promise<UserRecord>;
}
