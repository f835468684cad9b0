import type { NextFunction, Request, Response } from 'express';
import { CleanupImagesBodySchema, type CleanupImagesResponse } from '@imageshelf/api-contracts';
import type { CleanupService } from '../../services/images/imageCleanup.js';
import { logger } from '../../utils/logger.js';

export function createMaintenanceController(deps: { cleanup: CleanupService }) {
  return {
    cleanupImages: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = CleanupImagesBodySchema.parse(req.body ?? {});
        const paths = await deps.cleanup.sweep(body);
        logger.info('maintenance.images.cleanup', { requestId: req.requestId, dryRun: body.dryRun, count: paths.length });
        const payload: CleanupImagesResponse = { dryRun: body.dryRun, count: paths.length, paths };
        return res.json(payload);
      } catch (error) {
        return next(error);
      }
    },
  };
}
