import type { Express } from 'express';
import { createImageController } from '../controllers/images/imageController.js';
import { createMaintenanceController } from '../controllers/images/maintenanceController.js';
import type { ImageServices } from '../services/images/index.js';
import type { ImageRepository } from '../services/images/types.js';
import { metricsRegistry } from '../utils/metrics.js';
import { createImageRoutes } from './images.js';
import { createMaintenanceRoutes } from './maintenance.js';

export type RouteDeps = {
  services: ImageServices;
  images: ImageRepository;
  maxFileSize: number;
  maintenanceToken: string | undefined;
};

export function setupRoutes(app: Express, deps: RouteDeps) {
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      const registry = metricsRegistry();
      res.setHeader('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (error) {
      next(error);
    }
  });

  const imageController = createImageController({ services: deps.services, images: deps.images });
  app.use('/images', createImageRoutes(imageController, { maxFileSize: deps.maxFileSize }));

  const maintenanceController = createMaintenanceController({ cleanup: deps.services.cleanup });
  app.use('/maintenance', createMaintenanceRoutes(maintenanceController, { token: deps.maintenanceToken }));
}
