import { Router, Request, Response, NextFunction } from 'express';
import { parseActivityBatch } from '../schemas/activity';
import type { IngestionService } from '../services/ingestion';

export const DAEMON_KEY_HEADER = 'x-api-key';

export function createActivityRouter(ingestion: IngestionService): Router {
  const router = Router();

  /**
   * POST /api/v1/activity
   * Receive a batch of activity samples from the tracking daemon
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // Nothing may be committed once the daemon has hung up
    const controller = new AbortController();
    const abortIfUnfinished = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', abortIfUnfinished);

    try {
      const credential = req.header(DAEMON_KEY_HEADER);

      // Reject a bad key before looking at the payload
      ingestion.authenticate(credential);
      const batch = parseActivityBatch(req.body);

      const result = await ingestion.ingest(batch, credential, { signal: controller.signal });
      res.json({ status: 'ok', logs_processed: result.recordsPersisted });
    } catch (error) {
      next(error);
    } finally {
      res.off('close', abortIfUnfinished);
    }
  });

  return router;
}
