// ============================================================================
// Input Schemas - zod validation for endpoint configs, traffic entries and
// API request bodies arriving from stores, files and HTTP
// ============================================================================

import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { EndpointConfig, TrafficEntry } from '../types';

const RateRuleSchema = z.object({
  limit: z.number(),
  intervalSeconds: z.number().positive(),
});

const AllowedHoursSchema = z.object({
  startHour: z.number().int().min(0).max(23),
  endHour: z.number().int().min(1).max(24),
});

/** Endpoint policy document as stored in `api_endpoints.config`. */
export const EndpointSettingsSchema = z.object({
  whitelist: z.array(z.string()).default([]),
  throttling: RateRuleSchema.nullable().optional(),
  quota: RateRuleSchema.nullable().optional(),
  authMethod: z.string().default('None'),
  allowedHours: AllowedHoursSchema.nullable().optional(),
  openAroundTheClockJustified: z.boolean().optional(),
  clientSsl: z.boolean().default(false),
  backendSsl: z.boolean().default(false),
  backendAddresses: z.array(z.string()).optional(),
  timezone: z.string().optional(),
  safeThrottlePerHour: z.number().positive().optional(),
});

export const EndpointConfigSchema = EndpointSettingsSchema.extend({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const TrafficEntrySchema = z.object({
  timestamp: z.union([z.string(), z.date()]),
  statusCode: z.coerce.number().int(),
  headers: z.record(z.coerce.string()).default({}),
  body: z.string().nullable().optional(),
  sourceIp: z.string().nullable().optional(),
  scheme: z.enum(['http', 'https']).nullable().optional(),
});

export const TrafficSampleSchema = z.array(TrafficEntrySchema);

export const RangeQuerySchema = z.object({
  start_date: z.string().optional(),
  end_date: z.string().optional(),
});

export const ShareRequestSchema = RangeQuerySchema.extend({
  email: z.string().email().optional(),
});

export const BatchRequestSchema = RangeQuerySchema.extend({
  endpointIds: z.array(z.string().min(1)).min(1).max(50),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Parses `raw` with `schema`, raising {@link ValidationError} with a path-qualified message. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseEndpointConfig(raw: unknown): EndpointConfig {
  return parseWith(EndpointConfigSchema, raw, 'endpoint config');
}

export function parseTrafficSample(raw: unknown): TrafficEntry[] {
  return parseWith(TrafficSampleSchema, raw, 'traffic log');
}
