import { AppError, ErrorKind } from '../utils/errors';
import { NewReview, ReviewChanges, ReviewListFilter, ReviewRecord, ReviewRepository } from './types';

function clone(record: ReviewRecord): ReviewRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime()),
  };
}

/**
 * In-process review backend. Records live in insertion order, so listing
 * order is creation order. Used with STORAGE_DRIVER=memory and by the tests.
 */
export class MemoryReviewRepository implements ReviewRepository {
  private records = new Map<string, ReviewRecord>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(review: NewReview): Promise<ReviewRecord> {
    for (const existing of this.records.values()) {
      if (existing.name === review.name) {
        throw new AppError(ErrorKind.CONFLICT, `Snack with name '${review.name}' already exists`);
      }
    }
    const timestamp = this.now();
    const record = clone({
      id: String(this.nextId++),
      ...review,
      deleted: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    this.records.set(record.id, record);
    return clone(record);
  }

  async findById(id: string): Promise<ReviewRecord | null> {
    const record = this.records.get(id);
    return record ? clone(record) : null;
  }

  async findLiveByName(name: string): Promise<ReviewRecord | null> {
    for (const record of this.records.values()) {
      if (record.name === name && !record.deleted) return clone(record);
    }
    return null;
  }

  async list(filter: ReviewListFilter = {}): Promise<ReviewRecord[]> {
    return Array.from(this.records.values())
      .filter(record => !record.deleted)
      .filter(record => filter.favorite === undefined || record.favorite === filter.favorite)
      .map(clone);
  }

  async updateLive(id: string, changes: ReviewChanges): Promise<ReviewRecord | null> {
    const record = this.records.get(id);
    if (!record || record.deleted) return null;
    const updated: ReviewRecord = { ...record, ...changes, updatedAt: new Date(this.now().getTime()) };
    this.records.set(id, updated);
    return clone(updated);
  }

  async markDeleted(id: string): Promise<ReviewRecord | null> {
    const record = this.records.get(id);
    if (!record || record.deleted) return null;
    const updated: ReviewRecord = { ...record, deleted: true, updatedAt: new Date(this.now().getTime()) };
    this.records.set(id, updated);
    return clone(updated);
  }

  async clear(): Promise<void> {
    this.records.clear();
    this.nextId = 1;
  }
}
