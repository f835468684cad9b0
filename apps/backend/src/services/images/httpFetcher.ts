import { isTimeoutError } from '../../utils/httpErrors.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { recordHttpClientTimeout } from '../../utils/metrics.js';
import { RemoteFetchError } from './errors.js';
import type { RemoteFetcher } from './types.js';

/** Plain GET with a hard deadline; any network failure or non-2xx answer is a RemoteFetchError. */
export function createHttpFetcher(opts: { timeoutMs: number; service?: string }): RemoteFetcher {
  const service = opts.service ?? 'image_fetch';

  return {
    async fetch(url) {
      let res: Response;
      try {
        res = await fetch(url, { signal: AbortSignal.timeout(opts.timeoutMs), redirect: 'follow' });
      } catch (error) {
        const timedOut = isTimeoutError(error);
        if (timedOut) recordHttpClientTimeout({ service, timeoutMs: opts.timeoutMs });
        logger.warn('images.fetch.failed', { url, timeout: timedOut, errorMessage: errorMessage(error) });
        throw new RemoteFetchError(url, undefined, error);
      }

      if (!res.ok) {
        logger.warn('images.fetch.bad_status', { url, status: res.status });
        throw new RemoteFetchError(url, `Cannot get image from ${url} (status ${res.status})`);
      }

      return Buffer.from(await res.arrayBuffer());
    },
  };
}
