import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { UserRepository } from '../repositories/types';
import { AppError, ErrorKind, invalidInput } from '../utils/errors';

export interface AccountOptions {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  bcryptRounds: number;
}

export interface AccountSummary {
  id: string;
  username: string;
}

export interface TokenPayload {
  id: string;
  username: string;
}

const MIN_PASSWORD_LENGTH = 8;

function requireCredentials(username: unknown, password: unknown): { username: string; password: string } {
  if (typeof username !== 'string' || !username.trim() || typeof password !== 'string' || !password) {
    throw invalidInput('Username and password are required');
  }
  return { username: username.trim(), password };
}

export class AccountService {
  constructor(
    private readonly users: UserRepository,
    private readonly options: AccountOptions
  ) {}

  async createAccount(username: unknown, password: unknown): Promise<AccountSummary> {
    const credentials = requireCredentials(username, password);
    if (credentials.password.length < MIN_PASSWORD_LENGTH) {
      throw invalidInput(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    if (await this.users.findByUsername(credentials.username)) {
      throw new AppError(ErrorKind.CONFLICT, `Username ${credentials.username} already exists`);
    }

    const passwordHash = await bcrypt.hash(credentials.password, this.options.bcryptRounds);
    const user = await this.users.create({ username: credentials.username, passwordHash });
    console.info('Account created: %s', user.username);
    return { id: user.id, username: user.username };
  }

  async login(username: unknown, password: unknown): Promise<{ token: string }> {
    const credentials = requireCredentials(username, password);
    const user = await this.users.findByUsername(credentials.username);
    if (!user || !(await bcrypt.compare(credentials.password, user.passwordHash))) {
      throw new AppError(ErrorKind.UNAUTHORIZED, 'Invalid username or password');
    }

    const payload: TokenPayload = { id: user.id, username: user.username };
    const token = jwt.sign(payload, this.options.jwtSecret, {
      expiresIn: this.options.jwtExpiresInSeconds,
    });
    return { token };
  }
}
