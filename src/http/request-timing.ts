import { logger } from '../observability/logger';
import { httpRequestDuration } from '../observability/metrics';

export interface RequestTiming {
  requestId: string;
  method: string;
  route: string;
  statusCode: number;
  elapsedMs: number;
  clientIp: string;
}

/** Observe the request duration; warn when it took `slowRequestMs` or longer */
export function recordRequestTiming(timing: RequestTiming, slowRequestMs: number): void {
  const { requestId, method, route, statusCode, elapsedMs, clientIp } = timing;
  httpRequestDuration.observe({ method, route, status_code: String(statusCode) }, elapsedMs / 1000);

  const details = { requestId, method, route, statusCode, ms: Math.round(elapsedMs) };
  if (elapsedMs >= slowRequestMs) {
    logger.warn({ ...details, clientIp }, 'Slow request');
  } else {
    logger.debug(details, 'Request completed');
  }
}
