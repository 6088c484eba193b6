import { Router, Request, Response, NextFunction } from 'express';
import type { Auth } from '../middleware/auth';
import { loginSchema, parseBody } from '../schemas/user';
import { verifyCredentials } from '../services/users';

export function createAuthRouter(auth: Auth): Router {
  const router = Router();

  /**
   * POST /api/v1/auth/login
   * Authenticate user and return JWT token
   */
  router.post('/login', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { email, password } = parseBody(loginSchema, req.body, 'Email and password are required');

      const user = await verifyCredentials(email, password);

      if (!user) {
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }

      res.json({
        token: auth.generateToken(user),
        tokenType: 'bearer',
        user,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
