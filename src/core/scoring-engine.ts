// ============================================================================
// Scoring Engine - facts -> analyzers -> nine scorers -> composite -> advice
// ============================================================================
//
// WORKFLOW (pure, synchronous, no I/O):
//   1. Extract normalized facts from the config snapshot and traffic sample
//   2. Scan the sample for sensitive keywords
//   3. Build the hourly histogram, error rate and outlier hours
//   4. Run the nine component scorers (each fails closed to 0)
//   5. Aggregate the weighted composite and its level
//   6. Derive recommendations for components below threshold
//
// ============================================================================

import { COMPONENTS, defaultWeights, validateWeights } from './components';
import { errorMessage } from './errors';
import { extractFacts } from '../agents/facts/fact-extractor';
import { scanSensitiveData } from '../agents/sensitive-data/sensitive-data-scanner';
import { analyzeTraffic } from '../agents/traffic/traffic-analyzer';
import { SCORERS, ScorerInput } from '../agents/scoring/component-scorers';
import { aggregate, buildComponentScore } from '../agents/scoring/score-aggregator';
import { generateRecommendations } from '../agents/report/recommendation-generator';
import {
  ComponentScore, CompositeScoreResult, EndpointConfig, KeywordSnapshot,
  ScoringSettings, TimeRange, TrafficSample,
} from '../types';

export function defaultScoringSettings(): ScoringSettings {
  return {
    anomalyK: 2,
    anomalyPenaltyPerHour: 25,
    errorRateCeiling: 20,
    errorStatusFloor: 400,
    safeThrottlePerHour: 10_000,
    keywordMatchMode: 'substring',
    weights: defaultWeights(),
  };
}

export class ScoringEngine {
  readonly settings: Readonly<ScoringSettings>;

  /** @throws ConfigurationError when the weight set is invalid */
  constructor(settings: Partial<ScoringSettings> = {}) {
    const merged = { ...defaultScoringSettings(), ...settings };
    this.settings = Object.freeze({ ...merged, weights: Object.freeze(validateWeights(merged.weights)) });
  }

  score(
    config: EndpointConfig | null | undefined,
    sample: TrafficSample | null | undefined,
    range: TimeRange,
    keywords: KeywordSnapshot,
  ): CompositeScoreResult {
    const settings = this.settings;
    const { facts, entries, droppedEntries } = extractFacts(config, sample, range, settings);

    const sensitiveData = scanSensitiveData(entries.map((e) => e.entry), keywords.keywords, settings.keywordMatchMode);
    const { stats: traffic, timezoneFallback } = analyzeTraffic(entries, {
      timezone: facts.timezone,
      anomalyK: settings.anomalyK,
      errorStatusFloor: settings.errorStatusFloor,
      droppedEntries,
    });

    const input: ScorerInput = { facts, traffic, sensitiveData, settings };
    const components: ComponentScore[] = COMPONENTS.map(({ id, label }) => {
      const weight = settings.weights[id];
      try {
        const { score, facts: explain } = SCORERS[id](input);
        if (id === 'traffic_anomaly' && timezoneFallback) {
          explain.timezoneNote = `unknown timezone ${facts.timezone}, bucketed in UTC`;
        }
        return buildComponentScore(id, label, score, weight, explain);
      } catch (error) {
        return buildComponentScore(id, label, 0, weight, { degraded: [errorMessage(error)] });
      }
    });

    const { overallScore, level } = aggregate(components);

    return {
      endpointId: facts.endpointId,
      endpointName: facts.endpointName,
      timeRange: { start: range.start.toISOString(), end: range.end.toISOString() },
      overallScore,
      level,
      components,
      traffic,
      sensitiveData,
      recommendations: generateRecommendations(components, { facts, traffic, sensitiveData }),
      keywordSetVersion: keywords.version,
    };
  }
}
