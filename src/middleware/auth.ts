// middleware/auth.ts
import jwt, { JwtPayload } from 'jsonwebtoken';
import { TokenPayload } from '../services/accounts';

export type AuthUser = JwtPayload & TokenPayload;

// The parts of Express' Request and Response the middleware touches.
export interface TokenRequest {
  headers: { authorization?: string };
  user?: AuthUser;
}

export interface StatusResponder {
  status(code: number): { json(body: { error: string }): unknown };
}

export type TokenMiddleware = (req: TokenRequest, res: StatusResponder, next: () => void) => void;

// Payload must carry the id and username issued at login
function isTokenPayload(payload: unknown): payload is AuthUser {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'id' in payload &&
    typeof payload.id === 'string' &&
    'username' in payload &&
    typeof payload.username === 'string'
  );
}

export function bearerToken(header: string | undefined): string | null {
  return header && header.startsWith('Bearer ') ? header.substring(7) : null;
}

export function authenticateToken(secret: string): TokenMiddleware {
  return (req, res, next) => {
    const token = bearerToken(req.headers.authorization);

    if (!token) {
      res.status(401).json({ error: 'Token not found' });
      return;
    }

    try {
      const decoded = jwt.verify(token, secret);

      if (!isTokenPayload(decoded)) {
        res.status(401).json({ error: 'Invalid token payload: missing user id' });
        return;
      }

      req.user = decoded;
    } catch (err) {
      console.error('JWT verification failed:', err);
      res.status(403).json({ error: 'Invalid or expired token' });
      return;
    }
    next();
  };
}
