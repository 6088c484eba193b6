import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import type { AppConfig } from '../config/settings';
import { AuthenticationError } from '../errors';
import { findUserById } from '../services/users';
import { User, UserRole } from '../types';

export type AuthenticatedUser = User;

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

interface TokenPayload {
  id: number;
  email: string;
  role: UserRole;
}

function isTokenPayload(value: unknown): value is TokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'email' in value &&
    typeof value.email === 'string'
  );
}

export interface Auth {
  generateToken(user: AuthenticatedUser): string;
  authMiddleware(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void>;
}

export function createAuth(config: AppConfig['auth']): Auth {
  function generateToken(user: AuthenticatedUser): string {
    const payload: TokenPayload = { id: user.id, email: user.email, role: user.role };
    return jwt.sign(payload, config.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: config.accessTokenExpireMinutes * 60,
    });
  }

  async function authMiddleware(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        res.status(401).json({ error: 'No token provided' });
        return;
      }

      const token = authHeader.substring(7);
      const decoded = jwt.verify(token, config.jwtSecret, { algorithms: ['HS256'] });

      if (!isTokenPayload(decoded)) {
        res.status(401).json({ error: 'Invalid token' });
        return;
      }

      // Fetch full user data
      const user = await findUserById(decoded.id);

      if (!user) {
        res.status(401).json({ error: 'User not found' });
        return;
      }

      req.user = user;
      next();
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({ error: 'Invalid token' });
        return;
      }
      next(error);
    }
  }

  return { generateToken, authMiddleware };
}

export function requireRole(...roles: UserRole[]) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    if (!roles.includes(req.user.role)) {
      res.status(403).json({ error: 'Insufficient permissions' });
      return;
    }

    next();
  };
}

/** The authenticated user, for handlers mounted behind authMiddleware. */
export function requireUser(req: AuthenticatedRequest): AuthenticatedUser {
  if (!req.user) {
    throw new AuthenticationError('User not authenticated');
  }
  return req.user;
}
