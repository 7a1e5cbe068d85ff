import { Counter, Registry } from 'prom-client';

export interface Metrics {
  registry: Registry;
  httpRequests: Counter<'method' | 'path'>;
}

/**
 * One registry per app instance, so tests building several apps never
 * register the same metric twice.
 */
export function createMetrics(): Metrics {
  const registry = new Registry();

  const httpRequests = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'path'] as const,
    registers: [registry],
  });

  return { registry, httpRequests };
}
