// Shared builders for the test suites

import { staticSnapshot } from '../store/keyword-store';
import { EndpointConfig, TimeRange, TrafficEntry } from '../types';

export const RANGE: TimeRange = {
  start: new Date('2024-03-01T00:00:00.000Z'),
  end: new Date('2024-03-07T23:59:59.999Z'),
};

export const KEYWORDS = staticSnapshot(['password', 'api_key', 'credit_card']);

/** Well-configured endpoint: every config-driven component scores full marks except auth (OAuth). */
export function endpointConfig(overrides: Partial<EndpointConfig> = {}): EndpointConfig {
  return {
    id: 'orders-api',
    name: 'Orders API',
    whitelist: ['10.0.0.0/24'],
    throttling: { limit: 100, intervalSeconds: 60 },
    quota: { limit: 10_000, intervalSeconds: 86_400 },
    authMethod: 'OAuth',
    allowedHours: { startHour: 8, endHour: 20 },
    clientSsl: true,
    backendSsl: true,
    timezone: 'UTC',
    ...overrides,
  };
}

/** Endpoint with no controls configured. */
export function weakConfig(overrides: Partial<EndpointConfig> = {}): EndpointConfig {
  return {
    id: 'legacy-api',
    name: 'Legacy API',
    whitelist: [],
    throttling: null,
    quota: null,
    authMethod: 'None',
    allowedHours: null,
    clientSsl: false,
    backendSsl: false,
    timezone: 'UTC',
    ...overrides,
  };
}

export function entry(overrides: Partial<TrafficEntry> = {}): TrafficEntry {
  return {
    timestamp: '2024-03-02T10:15:00.000Z',
    statusCode: 200,
    headers: { 'content-type': 'application/json' },
    body: '{"orderId":42}',
    sourceIp: '10.0.0.5',
    scheme: 'https',
    ...overrides,
  };
}

/** One clean request in every hour of 2024-03-02 (flat histogram). */
export function flatDay(): TrafficEntry[] {
  return Array.from({ length: 24 }, (_, hour) =>
    entry({ timestamp: `2024-03-02T${String(hour).padStart(2, '0')}:15:00.000Z` }));
}

/**
 * Four requests in the 10:00 hour: two over plain HTTP, one 500, one body
 * carrying a password.
 */
export function weakSample(): TrafficEntry[] {
  return [
    entry({ sourceIp: '198.51.100.7', scheme: 'http' }),
    entry({ sourceIp: '198.51.100.7', scheme: 'http', timestamp: '2024-03-02T10:20:00.000Z', statusCode: 500 }),
    entry({ sourceIp: '198.51.100.8', timestamp: '2024-03-02T10:25:00.000Z', body: 'user=bob&password=test-secret' }),
    entry({ sourceIp: '198.51.100.8', timestamp: '2024-03-02T10:30:00.000Z' }),
  ];
}
