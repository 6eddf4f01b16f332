import mongoose from 'mongoose';
import Review, { ReviewLean } from '../models/Review';
import { AppError, ErrorKind } from '../utils/errors';
import { NewReview, ReviewChanges, ReviewListFilter, ReviewRecord, ReviewRepository } from './types';

function isValidObjectId(id: string): boolean {
  return mongoose.Types.ObjectId.isValid(id);
}

export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

function storageError(action: string, err: unknown): AppError {
  return new AppError(ErrorKind.STORAGE_ERROR, `Database error while ${action}`, { cause: err });
}

function toRecord(doc: ReviewLean): ReviewRecord {
  return {
    id: doc._id.toString(),
    name: doc.name,
    location: doc.location,
    rating: doc.rating,
    favorite: doc.favorite,
    review: doc.review ?? null,
    deleted: doc.deleted,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoReviewRepository implements ReviewRepository {
  async insert(review: NewReview): Promise<ReviewRecord> {
    try {
      const created = await Review.create({ ...review, deleted: false });
      const doc = await Review.findById(created._id).lean<ReviewLean>();
      if (!doc) {
        throw new Error(`Review ${created._id.toString()} vanished after insert`);
      }
      return toRecord(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new AppError(ErrorKind.CONFLICT, `Snack with name '${review.name}' already exists`);
      }
      throw storageError('creating review', err);
    }
  }

  async findById(id: string): Promise<ReviewRecord | null> {
    if (!isValidObjectId(id)) return null;
    try {
      const doc = await Review.findById(id).lean<ReviewLean>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storageError('fetching review', err);
    }
  }

  async findLiveByName(name: string): Promise<ReviewRecord | null> {
    try {
      const doc = await Review.findOne({ name, deleted: false }).lean<ReviewLean>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storageError('fetching review by name', err);
    }
  }

  async list(filter: ReviewListFilter = {}): Promise<ReviewRecord[]> {
    const query: { deleted: false; favorite?: boolean } = { deleted: false };
    if (filter.favorite !== undefined) query.favorite = filter.favorite;
    try {
      const docs = await Review.find(query).sort({ createdAt: 1, _id: 1 }).lean<ReviewLean[]>();
      return docs.map(toRecord);
    } catch (err) {
      throw storageError('listing reviews', err);
    }
  }

  async updateLive(id: string, changes: ReviewChanges): Promise<ReviewRecord | null> {
    if (!isValidObjectId(id)) return null;
    try {
      const doc = await Review.findOneAndUpdate(
        { _id: id, deleted: false },
        { $set: changes },
        { new: true, runValidators: true }
      ).lean<ReviewLean>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storageError('updating review', err);
    }
  }

  async markDeleted(id: string): Promise<ReviewRecord | null> {
    if (!isValidObjectId(id)) return null;
    try {
      const doc = await Review.findOneAndUpdate(
        { _id: id, deleted: false },
        { $set: { deleted: true } },
        { new: true }
      ).lean<ReviewLean>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw storageError('deleting review', err);
    }
  }

  async clear(): Promise<void> {
    try {
      await Review.deleteMany({});
    } catch (err) {
      throw storageError('clearing reviews', err);
    }
  }
}
