import express from 'express';
import helmet from 'helmet';
import { errorHandler } from './middleware/errorHandler.js';
import { requestContext } from './middleware/requestContext.js';
import { setupRoutes, type RouteDeps } from './routes/index.js';
import { IMAGE_ROOT } from './services/images/imagePaths.js';
import { ERROR_CODES, ERROR_MESSAGES } from './shared/errors.js';

export type AppDeps = RouteDeps & {
  /** Directory served under `/uploads/images` for the public local backend; null when not serving files. */
  publicRoot: string | null;
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(requestContext);
  // Images are embedded by other origins.
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  // Base64 uploads carry the whole image in the JSON body.
  app.use(express.json({ limit: Math.ceil(deps.maxFileSize * 1.4) }));

  if (deps.publicRoot) {
    app.use(`/${IMAGE_ROOT}`, express.static(`${deps.publicRoot}/${IMAGE_ROOT}`, { index: false, fallthrough: true }));
  }

  setupRoutes(app, deps);

  app.use((req, res) => {
    res.status(404).json({ errorCode: ERROR_CODES.NOT_FOUND, error: ERROR_MESSAGES.NOT_FOUND, requestId: req.requestId });
  });

  app.use(errorHandler);
  return app;
}
