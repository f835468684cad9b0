import { Router } from 'express';
import type { createMaintenanceController } from '../controllers/images/maintenanceController.js';
import { requireMaintenanceToken } from '../middleware/maintenanceAuth.js';

export function createMaintenanceRoutes(
  controller: ReturnType<typeof createMaintenanceController>,
  opts: { token: string | undefined }
): Router {
  const maintenanceRoutes = Router();
  maintenanceRoutes.use(requireMaintenanceToken(opts.token));
  maintenanceRoutes.post('/images/cleanup', controller.cleanupImages);
  return maintenanceRoutes;
}
