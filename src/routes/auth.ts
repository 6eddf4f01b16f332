import express from 'express';
import { AccountService } from '../services/accounts';
import { handleRouteError } from '../utils/httpErrors';

export function createAuthRouter(accounts: AccountService) {
  const router = express.Router();

  router.post('/create-account', async (req, res) => {
    try {
      const { username, password } = req.body ?? {};
      const account = await accounts.createAccount(username, password);
      res.status(201).json({ message: 'Account created successfully', ...account });
    } catch (err) {
      handleRouteError(res, err, 'POST /api/auth/create-account');
    }
  });

  router.post('/login', async (req, res) => {
    try {
      const { username, password } = req.body ?? {};
      res.json(await accounts.login(username, password));
    } catch (err) {
      handleRouteError(res, err, 'POST /api/auth/login');
    }
  });

  return router;
}
