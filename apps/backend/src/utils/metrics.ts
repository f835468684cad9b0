import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: registry, prefix: 'imageshelf_' });
}

const httpRequestsTotal = new Counter({
  name: 'imageshelf_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [registry],
});

const httpRequestDurationSeconds = new Histogram({
  name: 'imageshelf_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

const httpClientTimeoutSeconds = new Histogram({
  name: 'imageshelf_http_client_timeout_seconds',
  help: 'External HTTP client timeout duration in seconds',
  labelNames: ['service'],
  buckets: [0.25, 0.5, 1, 2, 5, 10, 15, 30, 60, 120],
  registers: [registry],
});

export const imageMetrics = {
  thumbnailRequests: new Counter({
    name: 'imageshelf_thumbnail_requests_total',
    help: 'Thumbnail lookups by how they were answered',
    labelNames: ['result'],
    registers: [registry],
  }),
  thumbnailGenerationSeconds: new Histogram({
    name: 'imageshelf_thumbnail_generation_seconds',
    help: 'Time spent reading, resizing and writing a new thumbnail',
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry],
  }),
  imagesSaved: new Counter({
    name: 'imageshelf_images_saved_total',
    help: 'Source images written to storage',
    labelNames: ['type', 'source'],
    registers: [registry],
  }),
  imagesDestroyed: new Counter({
    name: 'imageshelf_images_destroyed_total',
    help: 'Images removed together with their variants',
    labelNames: ['type'],
    registers: [registry],
  }),
};

export function recordHttpRequest(params: { method: string; route: string; status: number; durationSeconds: number }) {
  const route = params.route || 'unknown';
  const status = String(params.status || 0);
  httpRequestsTotal.inc({ method: params.method, route, status }, 1);
  httpRequestDurationSeconds.observe({ route }, Math.max(0, params.durationSeconds));
}

export function recordHttpClientTimeout(params: { service: string; timeoutMs: number }) {
  const label = params.service ? params.service : 'unknown';
  const seconds = Math.max(0, params.timeoutMs) / 1000;
  httpClientTimeoutSeconds.observe({ service: label }, seconds);
}

export function metricsRegistry(): Registry {
  return registry;
}
