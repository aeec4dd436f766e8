import { describe, it, expect } from 'vitest';
import { ScoringEngine, defaultScoringSettings } from './scoring-engine';
import { ConfigurationError, MissingDataError } from './errors';
import { COMPONENT_IDS } from './components';
import { KEYWORDS, RANGE, endpointConfig, entry, flatDay, weakConfig, weakSample } from '../testing/fixtures';

const engine = new ScoringEngine();

function scoresOf(result: ReturnType<ScoringEngine['score']>): Record<string, number> {
  return Object.fromEntries(result.components.map((c) => [c.component, c.score]));
}

describe('ScoringEngine', () => {
  it('should score a well-configured endpoint as Excellent', () => {
    const result = engine.score(endpointConfig(), flatDay(), RANGE, KEYWORDS);

    expect(result.overallScore).toBe(96);
    expect(result.level).toBe('Excellent');
    expect(result.components.map((c) => c.component)).toEqual([...COMPONENT_IDS]);
    expect(scoresOf(result)).toEqual({
      ip_whitelist_coverage: 100,
      throttling_configured: 100,
      quota_configured: 100,
      authentication_strength: 80,
      allowed_hours: 100,
      traffic_anomaly: 100,
      error_rate: 100,
      ssl_tls_status: 100,
      logging_status: 100,
    });
    expect(result.timeRange).toEqual({ start: '2024-03-01T00:00:00.000Z', end: '2024-03-07T23:59:59.999Z' });
    expect(result.keywordSetVersion).toBe(KEYWORDS.version);
  });

  it('should score a weak endpoint as Critical', () => {
    const result = engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS);

    expect(scoresOf(result)).toEqual({
      ip_whitelist_coverage: 0,
      throttling_configured: 0,
      quota_configured: 0,
      authentication_strength: 0,
      allowed_hours: 0,
      traffic_anomaly: 75,
      error_rate: 0,
      ssl_tls_status: 30,
      logging_status: 40,
    });
    expect(result.overallScore).toBe(14.75);
    expect(result.level).toBe('Critical');
    expect(result.traffic.anomalousHours).toEqual([10]);
    expect(result.sensitiveData.matchPercentage).toBe(25);
  });

  it('should score an empty sample from configuration alone', () => {
    const result = engine.score(endpointConfig(), [], RANGE, KEYWORDS);
    expect(result.overallScore).toBe(96);
    expect(result.traffic.totalRequests).toBe(0);
    expect(result.sensitiveData.noData).toBe(true);
  });

  it('should return identical results for identical inputs', () => {
    const first = JSON.stringify(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS));
    const second = JSON.stringify(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS));
    expect(second).toBe(first);
  });

  it('should throw MissingDataError without a configuration', () => {
    expect(() => engine.score(null, flatDay(), RANGE, KEYWORDS)).toThrow(MissingDataError);
  });

  it('should count entries dropped for falling outside the range', () => {
    const sample = [...flatDay(), entry({ timestamp: '2024-04-01T00:00:00Z' }), entry({ timestamp: 'garbage' })];
    const result = engine.score(endpointConfig(), sample, RANGE, KEYWORDS);
    expect(result.traffic.totalRequests).toBe(24);
    expect(result.traffic.droppedEntries).toBe(2);
  });

  it('should note a timezone fallback on the anomaly component', () => {
    const result = engine.score(endpointConfig({ timezone: 'Nowhere/Special' }), flatDay(), RANGE, KEYWORDS);
    const anomaly = result.components.find((c) => c.component === 'traffic_anomaly');
    expect(anomaly?.facts.timezoneNote).toBe('unknown timezone Nowhere/Special, bucketed in UTC');
    expect(result.traffic.timezone).toBe('UTC');
  });

  it('should degrade a component whose settings are unusable', () => {
    const degradedEngine = new ScoringEngine({ errorRateCeiling: 0 });
    const result = degradedEngine.score(endpointConfig(), flatDay(), RANGE, KEYWORDS);
    const errorRate = result.components.find((c) => c.component === 'error_rate');
    expect(errorRate?.score).toBe(0);
    expect(errorRate?.facts.degraded).toEqual(['error rate ceiling is not configured']);
    expect(result.overallScore).toBe(91);
  });

  it('should apply custom weights', () => {
    const weights = { ...defaultScoringSettings().weights, authentication_strength: 0.1, logging_status: 0.3 };
    const result = new ScoringEngine({ weights }).score(endpointConfig(), flatDay(), RANGE, KEYWORDS);
    expect(result.overallScore).toBe(98);
  });

  it('should reject an invalid weight set', () => {
    const weights = { ...defaultScoringSettings().weights, logging_status: 0.5 };
    expect(() => new ScoringEngine({ weights })).toThrow(ConfigurationError);
  });
});
