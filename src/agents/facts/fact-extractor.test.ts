import { describe, it, expect } from 'vitest';
import { extractFacts, headerValue, normalizeAuthMethod, selectEntries, sourceIpOf, windowLength } from './fact-extractor';
import { MissingDataError } from '../../core/errors';
import { RANGE, endpointConfig, entry, weakConfig, weakSample } from '../../testing/fixtures';

const settings = { safeThrottlePerHour: 10_000, errorStatusFloor: 400 };

describe('extractFacts', () => {
  it('should require a configuration snapshot', () => {
    expect(() => extractFacts(null, [], RANGE, settings)).toThrow(MissingDataError);
  });

  it('should derive whitelist coverage from observed source IPs', () => {
    const sample = [
      entry({ sourceIp: '10.0.0.5' }),
      entry({ sourceIp: '10.0.0.5' }),
      entry({ sourceIp: '203.0.113.9' }),
      entry({ sourceIp: null, headers: { 'X-Forwarded-For': '10.0.0.8, 172.16.0.1' } }),
    ];
    const { facts } = extractFacts(endpointConfig(), sample, RANGE, settings);

    expect(facts.observedSourceIps).toBe(3);
    expect(facts.unmatchedSourceIps).toEqual(['203.0.113.9']);
    expect(facts.whitelistCoverage).toBeCloseTo(2 / 3, 10);
  });

  it('should report full coverage when no source IP was observed', () => {
    const { facts } = extractFacts(endpointConfig(), [entry({ sourceIp: null })], RANGE, settings);
    expect(facts.observedSourceIps).toBe(0);
    expect(facts.whitelistCoverage).toBe(1);
  });

  it('should normalize rate rules to requests per hour', () => {
    const { facts } = extractFacts(endpointConfig(), [], RANGE, settings);
    expect(facts.throttleConfigured).toBe(true);
    expect(facts.throttlePerHour).toBe(6000);
    expect(facts.quotaConfigured).toBe(true);

    const unbounded = extractFacts(endpointConfig({ throttling: { limit: 0, intervalSeconds: 60 } }), [], RANGE, settings);
    expect(unbounded.facts.throttleConfigured).toBe(true);
    expect(unbounded.facts.throttlePerHour).toBeNull();
    expect(unbounded.facts.throttleRuleValid).toBe(true);
  });

  it('should mark rules with a non-finite limit or non-positive interval invalid', () => {
    const nonFinite = extractFacts(endpointConfig({ throttling: { limit: Number.NaN, intervalSeconds: 60 } }), [], RANGE, settings);
    expect(nonFinite.facts.throttleRuleValid).toBe(false);
    expect(nonFinite.facts.throttlePerHour).toBeNull();

    const zeroInterval = extractFacts(endpointConfig({ throttling: { limit: 100, intervalSeconds: 0 } }), [], RANGE, settings);
    expect(zeroInterval.facts.throttleRuleValid).toBe(false);
  });

  it('should prefer the endpoint safe throttle override', () => {
    const { facts } = extractFacts(endpointConfig({ safeThrottlePerHour: 5000 }), [], RANGE, settings);
    expect(facts.safeThrottlePerHour).toBe(5000);
  });

  it('should summarize the weak sample', () => {
    const { facts, droppedEntries } = extractFacts(weakConfig(), weakSample(), RANGE, settings);
    expect(facts).toMatchObject({
      endpointId: 'legacy-api',
      endpointName: 'Legacy API',
      whitelistEntryCount: 0,
      observedSourceIps: 2,
      unmatchedSourceIps: ['198.51.100.7', '198.51.100.8'],
      whitelistCoverage: 0,
      throttleConfigured: false,
      throttlePerHour: null,
      throttleRuleValid: true,
      authMethod: 'None',
      allowedHoursRestricted: false,
      clientHttpsRatio: 0.5,
      backendHttpsRatio: null,
      totalRequests: 4,
      errorCount: 1,
    });
    expect(droppedEntries).toBe(0);
  });

  it('should flag non-HTTPS backend addresses', () => {
    const config = endpointConfig({ backendAddresses: ['https://orders.internal', 'http://legacy.internal:8080'] });
    const { facts } = extractFacts(config, [], RANGE, settings);
    expect(facts.backendHttpsRatio).toBe(0.5);
    expect(facts.nonHttpsBackends).toEqual(['http://legacy.internal:8080']);
  });

  it('should treat invalid allowed hours as unrestricted', () => {
    const { facts } = extractFacts(endpointConfig({ allowedHours: { startHour: 25, endHour: 3 } }), [], RANGE, settings);
    expect(facts.allowedHoursWindow).toBeNull();
    expect(facts.allowedHoursRestricted).toBe(false);
  });
});

describe('selectEntries', () => {
  it('should drop entries outside the range or without a valid timestamp', () => {
    const { entries, dropped } = selectEntries([
      entry(),
      entry({ timestamp: '2024-02-28T10:00:00Z' }),
      entry({ timestamp: 'not a timestamp' }),
    ], RANGE);
    expect(entries).toHaveLength(1);
    expect(dropped).toBe(2);
  });

  it('should accept a missing sample', () => {
    expect(selectEntries(null, RANGE)).toEqual({ entries: [], dropped: 0 });
  });
});

describe('helpers', () => {
  it('should map auth aliases and fall back to None', () => {
    expect(normalizeAuthMethod('oauth2')).toBe('OAuth');
    expect(normalizeAuthMethod(' API_KEY ')).toBe('ApiKey');
    expect(normalizeAuthMethod('mtls')).toBe('mTLS');
    expect(normalizeAuthMethod('kerberos')).toBe('None');
    expect(normalizeAuthMethod(undefined)).toBe('None');
  });

  it('should look up headers case-insensitively', () => {
    expect(headerValue({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
    expect(headerValue({}, 'authorization')).toBeUndefined();
  });

  it('should read the first forwarded address when the source IP is missing', () => {
    expect(sourceIpOf(entry({ sourceIp: null, headers: { 'x-forwarded-for': ' 192.0.2.4 , 10.0.0.1' } }))).toBe('192.0.2.4');
    expect(sourceIpOf(entry({ sourceIp: null, headers: {} }))).toBeNull();
  });

  it('should measure window lengths including overnight wraps', () => {
    expect(windowLength({ startHour: 22, endHour: 6 })).toBe(8);
    expect(windowLength({ startHour: 0, endHour: 24 })).toBe(24);
    expect(windowLength({ startHour: 5, endHour: 5 })).toBe(24);
    expect(windowLength({ startHour: 8, endHour: 20 })).toBe(12);
  });
});
