import { Router, Response, NextFunction } from 'express';
import { Auth, AuthenticatedRequest, requireRole, requireUser } from '../middleware/auth';
import { parseDateRange } from '../schemas/report';
import { getCompanyReport, getEmployeeReport, getTeamMemberReport, getTeamReport } from '../services/reports';

export function createDashboardRouter(auth: Auth): Router {
  const router = Router();

  router.use(auth.authMiddleware);

  /**
   * GET /api/v1/dashboard/me?startDate=YYYY-MM-DD&endDate=YYYY-MM-DD
   * Productivity report for the logged-in user
   */
  router.get('/me', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = requireUser(req);
      const range = parseDateRange(req.query);
      res.json(await getEmployeeReport(user.id, range));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/dashboard/team
   * Aggregated report for the manager's direct reports
   */
  router.get(
    '/team',
    requireRole('manager'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const manager = requireUser(req);
        const range = parseDateRange(req.query);
        res.json(await getTeamReport(manager, range));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/dashboard/team/:employeeId
   * Detailed report for one direct report
   */
  router.get(
    '/team/:employeeId',
    requireRole('manager'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const manager = requireUser(req);
        const range = parseDateRange(req.query);
        res.json(await getTeamMemberReport(manager, req.params.employeeId, range));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/dashboard/company
   * Company-wide report (CEO only)
   */
  router.get(
    '/company',
    requireRole('ceo'),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
      try {
        const range = parseDateRange(req.query);
        res.json(await getCompanyReport(range));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
