import jwt from 'jsonwebtoken';
import { MemoryUserRepository } from '../../repositories/userRepositories';
import { ErrorKind } from '../../utils/errors';
import { AccountService } from '../accounts';

describe('AccountService', () => {
  let users: MemoryUserRepository;
  let accounts: AccountService;

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    users = new MemoryUserRepository();
    accounts = new AccountService(users, {
      jwtSecret: 'test-secret',
      jwtExpiresInSeconds: 60,
      bcryptRounds: 4,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates an account with a hashed password', async () => {
    const account = await accounts.createAccount(' test_user ', 'test_pass');

    expect(account).toEqual({ id: '1', username: 'test_user' });
    const stored = await users.findByUsername('test_user');
    expect(stored?.passwordHash).toBeDefined();
    expect(stored?.passwordHash).not.toBe('test_pass');
  });

  it('rejects a username that already exists', async () => {
    await accounts.createAccount('test_user', 'test_pass');

    await expect(accounts.createAccount('test_user', 'other_pass')).rejects.toMatchObject({
      kind: ErrorKind.CONFLICT,
    });
  });

  it.each([
    [undefined, 'test_pass'],
    ['test_user', undefined],
    ['  ', 'test_pass'],
    ['test_user', ''],
  ])('rejects missing credentials (%p, %p)', async (username, password) => {
    await expect(accounts.createAccount(username, password)).rejects.toMatchObject({
      kind: ErrorKind.INVALID_INPUT,
    });
  });

  it('rejects a short password', async () => {
    await expect(accounts.createAccount('test_user', 'short')).rejects.toMatchObject({
      kind: ErrorKind.INVALID_INPUT,
      message: 'Password must be at least 8 characters',
    });
  });

  it('issues a token carrying the user id and name', async () => {
    await accounts.createAccount('test_user', 'test_pass');

    const { token } = await accounts.login('test_user', 'test_pass');

    const payload = jwt.verify(token, 'test-secret');
    expect(payload).toMatchObject({ id: '1', username: 'test_user' });
  });

  it('rejects a wrong password', async () => {
    await accounts.createAccount('test_user', 'test_pass');

    await expect(accounts.login('test_user', 'wrong_pass')).rejects.toMatchObject({
      kind: ErrorKind.UNAUTHORIZED,
    });
  });

  it('rejects an unknown user the same way', async () => {
    await expect(accounts.login('nobody', 'test_pass')).rejects.toMatchObject({
      kind: ErrorKind.UNAUTHORIZED,
      message: 'Invalid username or password',
    });
  });
});
