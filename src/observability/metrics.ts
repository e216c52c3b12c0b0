import client from 'prom-client';

export const registry = new client.Registry();

if (process.env.NODE_ENV !== 'test') {
  client.collectDefaultMetrics({ register: registry, prefix: 'storefront_' });
}

export const httpRequestDuration = new client.Histogram({
  name: 'storefront_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

export const ordersPlaced = new client.Counter({
  name: 'storefront_orders_placed_total',
  help: 'Orders successfully placed',
  registers: [registry],
});

export const orderPlacementFailures = new client.Counter({
  name: 'storefront_order_placement_failures_total',
  help: 'Order placements rolled back, by reason',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const orderTransitions = new client.Counter({
  name: 'storefront_order_transitions_total',
  help: 'Order status transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const cacheHitsTotal = new client.Counter({
  name: 'storefront_cache_hits_total',
  help: 'Read-model cache hits',
  labelNames: ['cache_type'] as const,
  registers: [registry],
});

export const cacheMissesTotal = new client.Counter({
  name: 'storefront_cache_misses_total',
  help: 'Read-model cache misses',
  labelNames: ['cache_type'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
