import { Router, Response, NextFunction } from 'express';
import { Auth, AuthenticatedRequest, requireRole } from '../middleware/auth';
import {
  createUserSchema,
  parseBody,
  passwordResetSchema,
  updateUserSchema,
  userIdSchema,
} from '../schemas/user';
import {
  authorizeInstaller,
  createUser,
  deleteUser,
  listTeams,
  listUsers,
  resetPassword,
  updateUser,
} from '../services/users';
import { ADMIN_ROLES } from '../types';

export function createAdminRouter(auth: Auth): Router {
  const router = Router();

  // HR admins and the CEO only
  router.use(auth.authMiddleware, requireRole(...ADMIN_ROLES));

  /**
   * POST /api/v1/admin/users
   * Create a user profile
   */
  router.post('/users', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseBody(createUserSchema, req.body);
      const user = await createUser(input);
      res.status(201).json(user);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/admin/users
   * List all users
   */
  router.get('/users', async (_req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const users = await listUsers();
      res.json({ total: users.length, items: users });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/v1/admin/users/:id
   * Update role, manager or title
   */
  router.put('/users/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = parseBody(userIdSchema, req.params.id, 'Invalid user id');
      const updates = parseBody(updateUserSchema, req.body);
      res.json(await updateUser(id, updates));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/v1/admin/users/:id
   * Remove a user and their activity history
   */
  router.delete('/users/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = parseBody(userIdSchema, req.params.id, 'Invalid user id');
      await deleteUser(id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/v1/admin/users/:id/password
   * Reset any user's password
   */
  router.put(
    '/users/:id/password',
    async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const id = parseBody(userIdSchema, req.params.id, 'Invalid user id');
        const { newPassword } = parseBody(passwordResetSchema, req.body);
        await resetPassword(id, newPassword);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/admin/installers/:employeeId
   * Authorize generation of a pre-configured daemon installer
   */
  router.get(
    '/installers/:employeeId',
    async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        res.json(await authorizeInstaller(req.params.employeeId));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/admin/teams
   * Every manager with their direct reports
   */
  router.get('/teams', async (_req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await listTeams());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
