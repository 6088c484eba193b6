import { Router, Response, NextFunction } from 'express';
import { Auth, AuthenticatedRequest, requireUser } from '../middleware/auth';
import { parseBody, passwordChangeSchema } from '../schemas/user';
import { changeOwnPassword } from '../services/users';

export function createUsersRouter(auth: Auth): Router {
  const router = Router();

  router.use(auth.authMiddleware);

  /**
   * GET /api/v1/users/me
   * Get the currently logged-in user
   */
  router.get('/me', (req: AuthenticatedRequest, res: Response): void => {
    res.json(requireUser(req));
  });

  /**
   * PUT /api/v1/users/me/password
   * Change own password
   */
  router.put('/me/password', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = requireUser(req);
      const { currentPassword, newPassword } = parseBody(passwordChangeSchema, req.body);

      await changeOwnPassword(user, currentPassword, newPassword);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
