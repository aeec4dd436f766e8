// ============================================================================
// Fact Extractor - normalizes endpoint configuration and traffic samples into
// the fixed fact set the component scorers read
// ============================================================================

import { MissingDataError } from '../../core/errors';
import { isWhitelisted, normalizeIp } from '../../utils/ip';
import { isWithinRange, parseTimestamp } from '../../utils/time';
import {
  AllowedHoursWindow, AuthMethod, EndpointConfig, EndpointFacts,
  RateRule, ScoringSettings, TimeRange, TrafficEntry, TrafficSample,
} from '../../types';

const AUTH_ALIASES: Record<string, AuthMethod> = {
  none: 'None',
  apikey: 'ApiKey',
  api_key: 'ApiKey',
  'api-key': 'ApiKey',
  basic: 'Basic',
  oauth: 'OAuth',
  oauth2: 'OAuth',
  jwt: 'JWT',
  mtls: 'mTLS',
};

export interface TimedEntry {
  entry: TrafficEntry;
  at: Date;
}

export interface ExtractedFacts {
  facts: EndpointFacts;
  entries: TimedEntry[];
  droppedEntries: number;
}

export function normalizeAuthMethod(value: string | null | undefined): AuthMethod {
  if (!value) return 'None';
  return AUTH_ALIASES[value.trim().toLowerCase()] ?? 'None';
}

/** Case-insensitive header lookup. */
export function headerValue(headers: Record<string, string> | null | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : headers[key];
}

export function sourceIpOf(entry: TrafficEntry): string | null {
  if (entry.sourceIp) return normalizeIp(entry.sourceIp);
  const forwarded = headerValue(entry.headers, 'x-forwarded-for');
  const first = forwarded?.split(',')[0]?.trim();
  return first ? normalizeIp(first) : null;
}

/** Keeps entries whose timestamp parses and falls inside the range. */
export function selectEntries(
  sample: TrafficSample | null | undefined,
  range: TimeRange,
): { entries: TimedEntry[]; dropped: number } {
  const entries: TimedEntry[] = [];
  let dropped = 0;

  for (const entry of sample ?? []) {
    const at = parseTimestamp(entry?.timestamp);
    if (!at || !isWithinRange(at, range)) {
      dropped++;
      continue;
    }
    entries.push({ entry, at });
  }

  return { entries, dropped };
}

function isValidRule(rule: RateRule): boolean {
  return Number.isFinite(rule.limit) && Number.isFinite(rule.intervalSeconds) && rule.intervalSeconds > 0;
}

// A limit of zero or below means unbounded
function perHour(rule: RateRule): number | null {
  if (!isValidRule(rule) || rule.limit <= 0) return null;
  return (rule.limit * 3600) / rule.intervalSeconds;
}

function validWindow(window: AllowedHoursWindow | null | undefined): AllowedHoursWindow | null {
  if (!window) return null;
  const { startHour, endHour } = window;
  if (!Number.isInteger(startHour) || !Number.isInteger(endHour)) return null;
  if (startHour < 0 || startHour > 23 || endHour < 1 || endHour > 24) return null;
  return { startHour, endHour };
}

// Overnight windows wrap (22 -> 6 is 8 hours); equal bounds mean all day
export function windowLength(window: AllowedHoursWindow): number {
  if (window.startHour === window.endHour % 24) return 24;
  return window.endHour > window.startHour
    ? window.endHour - window.startHour
    : 24 - window.startHour + window.endHour;
}

function httpsRatio(values: string[]): number | null {
  if (values.length === 0) return null;
  return values.filter((v) => v === 'https').length / values.length;
}

export function extractFacts(
  config: EndpointConfig | null | undefined,
  sample: TrafficSample | null | undefined,
  range: TimeRange,
  settings: Pick<ScoringSettings, 'safeThrottlePerHour' | 'errorStatusFloor'>,
): ExtractedFacts {
  if (!config) {
    throw new MissingDataError('Endpoint configuration is required for scoring');
  }

  const { entries, dropped } = selectEntries(sample, range);
  const whitelist = (config.whitelist ?? []).filter((w) => typeof w === 'string' && w.trim() !== '');

  // ---- Source IP coverage ----
  const observed = new Set<string>();
  for (const { entry } of entries) {
    const ip = sourceIpOf(entry);
    if (ip) observed.add(ip);
  }
  const unmatched = [...observed].filter((ip) => !isWhitelisted(ip, whitelist)).sort();
  const coverage = observed.size === 0 ? 1 : (observed.size - unmatched.length) / observed.size;

  // ---- SSL usage ----
  const schemes = entries
    .map(({ entry }) => entry.scheme)
    .filter((s): s is 'http' | 'https' => s === 'http' || s === 'https');
  const backendAddresses = (config.backendAddresses ?? []).filter((a) => typeof a === 'string' && a !== '');
  const backendSchemes = backendAddresses.map((a) => (a.toLowerCase().startsWith('https://') ? 'https' : 'http'));

  const window = validWindow(config.allowedHours);
  const errorCount = entries.filter(({ entry }) => entry.statusCode >= settings.errorStatusFloor).length;

  const facts: EndpointFacts = {
    endpointId: config.id,
    endpointName: config.name || config.id,
    timezone: config.timezone || 'UTC',
    whitelistEntryCount: whitelist.length,
    observedSourceIps: observed.size,
    unmatchedSourceIps: unmatched,
    whitelistCoverage: coverage,
    throttleConfigured: Boolean(config.throttling),
    throttlePerHour: config.throttling ? perHour(config.throttling) : null,
    throttleRuleValid: config.throttling ? isValidRule(config.throttling) : true,
    safeThrottlePerHour: config.safeThrottlePerHour ?? settings.safeThrottlePerHour,
    quotaConfigured: Boolean(config.quota),
    authMethod: normalizeAuthMethod(config.authMethod),
    declaredAuthMethod: config.authMethod ? String(config.authMethod) : 'None',
    allowedHoursRestricted: window !== null && windowLength(window) < 24,
    allowedHoursWindow: window,
    openAroundTheClockJustified: config.openAroundTheClockJustified === true,
    clientSsl: config.clientSsl === true,
    backendSsl: config.backendSsl === true,
    clientHttpsRatio: httpsRatio(schemes),
    backendHttpsRatio: httpsRatio(backendSchemes),
    nonHttpsBackends: backendAddresses.filter((a) => !a.toLowerCase().startsWith('https://')),
    totalRequests: entries.length,
    errorCount,
  };

  return { facts, entries, droppedEntries: dropped };
}
