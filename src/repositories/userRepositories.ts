import User, { UserLean } from '../models/User';
import { AppError, ErrorKind } from '../utils/errors';
import { isDuplicateKeyError } from './mongoReviewRepository';
import { UserRecord, UserRepository } from './types';

function usernameTaken(username: string): AppError {
  return new AppError(ErrorKind.CONFLICT, `Username ${username} already exists`);
}

function toRecord(doc: UserLean): UserRecord {
  return {
    id: doc._id.toString(),
    username: doc.username,
    passwordHash: doc.passwordHash,
    createdAt: doc.createdAt,
  };
}

export class MongoUserRepository implements UserRepository {
  async findByUsername(username: string): Promise<UserRecord | null> {
    try {
      const doc = await User.findOne({ username }).lean<UserLean>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw new AppError(ErrorKind.STORAGE_ERROR, 'Database error while fetching user', { cause: err });
    }
  }

  async create(user: { username: string; passwordHash: string }): Promise<UserRecord> {
    try {
      const created = await User.create(user);
      const doc = await User.findById(created._id).lean<UserLean>();
      if (!doc) {
        throw new Error(`User ${created._id.toString()} vanished after insert`);
      }
      return toRecord(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw usernameTaken(user.username);
      throw new AppError(ErrorKind.STORAGE_ERROR, 'Database error while creating user', { cause: err });
    }
  }
}

export class MemoryUserRepository implements UserRepository {
  private users = new Map<string, UserRecord>();
  private nextId = 1;

  async findByUsername(username: string): Promise<UserRecord | null> {
    const user = this.users.get(username);
    return user ? { ...user } : null;
  }

  async create(user: { username: string; passwordHash: string }): Promise<UserRecord> {
    if (this.users.has(user.username)) throw usernameTaken(user.username);
    const record: UserRecord = { id: String(this.nextId++), ...user, createdAt: new Date() };
    this.users.set(record.username, record);
    return { ...record };
  }
}
