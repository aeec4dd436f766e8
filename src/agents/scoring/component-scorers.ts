// ============================================================================
// Component Scorers - one pure function per security dimension
// ============================================================================
//
// Each scorer maps normalized facts to a 0-100 sub-score and the facts that
// explain it. Missing or malformed inputs score 0 with a `degraded` reason.
//
// ============================================================================

import { clampScore, round2 } from '../../core/components';
import {
  AuthMethod, ComponentFacts, ComponentId, EndpointFacts,
  ScoringSettings, SensitiveDataFinding, TrafficStats,
} from '../../types';

export interface ScorerInput {
  facts: EndpointFacts;
  traffic: TrafficStats;
  sensitiveData: SensitiveDataFinding;
  settings: ScoringSettings;
}

export interface ScorerOutput {
  score: number;
  facts: ComponentFacts;
}

export type ComponentScorer = (input: ScorerInput) => ScorerOutput;

export const AUTH_SCORES: Record<AuthMethod, number> = {
  None: 0,
  ApiKey: 40,
  Basic: 50,
  OAuth: 80,
  JWT: 90,
  mTLS: 100,
};

// Upper bounds are inclusive; the first matching band wins
const LOGGING_BANDS: readonly { maxPercentage: number; score: number }[] = [
  { maxPercentage: 0, score: 100 },
  { maxPercentage: 1, score: 80 },
  { maxPercentage: 5, score: 70 },
  { maxPercentage: 10, score: 60 },
  { maxPercentage: 20, score: 50 },
  { maxPercentage: 50, score: 40 },
  { maxPercentage: 80, score: 20 },
  { maxPercentage: Infinity, score: 10 },
];

const SSL_CLIENT_SHARE = 0.6;
const SSL_BACKEND_SHARE = 0.4;
const MAX_LISTED_IPS = 10;

function degraded(reason: string, facts: ComponentFacts = {}): ScorerOutput {
  return { score: 0, facts: { ...facts, degraded: [reason] } };
}

export function loggingScoreFor(matchPercentage: number): number {
  if (!Number.isFinite(matchPercentage) || matchPercentage < 0) return 0;
  const band = LOGGING_BANDS.find((b) => matchPercentage <= b.maxPercentage);
  return band ? band.score : 0;
}

function isAuthMethod(method: string): method is AuthMethod {
  return Object.prototype.hasOwnProperty.call(AUTH_SCORES, method);
}

export function authScoreFor(method: string): number {
  return isAuthMethod(method) ? AUTH_SCORES[method] : 0;
}

// ---------------------------------------------------------------------------
// Scorers
// ---------------------------------------------------------------------------
export const scoreIpWhitelist: ComponentScorer = ({ facts }) => {
  const explain: ComponentFacts = {
    whitelistEntries: facts.whitelistEntryCount,
    observedSourceIps: facts.observedSourceIps,
    unmatchedSourceIps: facts.unmatchedSourceIps.length,
    unmatchedSample: facts.unmatchedSourceIps.slice(0, MAX_LISTED_IPS),
  };

  if (facts.whitelistEntryCount === 0) {
    return {
      score: 0,
      facts: { ...explain, reason: facts.observedSourceIps > 0 ? 'whitelist empty while traffic exists' : 'no whitelist configured' },
    };
  }
  if (facts.observedSourceIps === 0) {
    return { score: 100, facts: { ...explain, reason: 'no source IPs observed' } };
  }
  if (!Number.isFinite(facts.whitelistCoverage)) {
    return degraded('whitelist coverage could not be computed', explain);
  }
  return { score: clampScore(facts.whitelistCoverage * 100), facts: { ...explain, coverage: round2(facts.whitelistCoverage) } };
};

export const scoreThrottling: ComponentScorer = ({ facts }) => {
  const explain: ComponentFacts = {
    configured: facts.throttleConfigured,
    ratePerHour: facts.throttlePerHour === null ? null : round2(facts.throttlePerHour),
    safeThresholdPerHour: facts.safeThrottlePerHour,
  };

  if (!facts.throttleConfigured) return { score: 0, facts: explain };
  if (!facts.throttleRuleValid) {
    return degraded('throttle rule has an invalid limit or interval', explain);
  }
  if (facts.throttlePerHour === null) {
    return { score: 50, facts: { ...explain, reason: 'throttle rule is unbounded' } };
  }
  if (!Number.isFinite(facts.safeThrottlePerHour) || facts.safeThrottlePerHour <= 0) {
    return degraded('safe throttle threshold is not configured', explain);
  }
  return facts.throttlePerHour <= facts.safeThrottlePerHour
    ? { score: 100, facts: explain }
    : { score: 50, facts: { ...explain, reason: 'throttle rate exceeds the safe threshold' } };
};

export const scoreQuota: ComponentScorer = ({ facts }) => ({
  score: facts.quotaConfigured ? 100 : 0,
  facts: { configured: facts.quotaConfigured },
});

export const scoreAuthentication: ComponentScorer = ({ facts }) => ({
  score: authScoreFor(facts.authMethod),
  facts: { method: facts.authMethod, declared: facts.declaredAuthMethod },
});

export const scoreAllowedHours: ComponentScorer = ({ facts }) => {
  const window = facts.allowedHoursWindow;
  const explain: ComponentFacts = {
    restricted: facts.allowedHoursRestricted,
    window: window ? `${window.startHour}-${window.endHour}` : null,
    justifiedAroundTheClock: facts.openAroundTheClockJustified,
  };
  if (facts.allowedHoursRestricted || facts.openAroundTheClockJustified) {
    return { score: 100, facts: explain };
  }
  return { score: 0, facts: explain };
};

export const scoreTrafficAnomaly: ComponentScorer = ({ traffic, settings }) => {
  const explain: ComponentFacts = {
    anomalousHours: traffic.anomalousHours,
    threshold: traffic.threshold,
    penaltyPerHour: settings.anomalyPenaltyPerHour,
  };
  if (!Number.isFinite(settings.anomalyPenaltyPerHour) || settings.anomalyPenaltyPerHour < 0) {
    return degraded('anomaly penalty is not configured', explain);
  }
  if (traffic.totalRequests === 0) {
    return { score: 100, facts: { ...explain, reason: 'no traffic in range' } };
  }
  const score = 100 - settings.anomalyPenaltyPerHour * traffic.anomalousHours.length;
  return { score: clampScore(score), facts: explain };
};

export const scoreErrorRate: ComponentScorer = ({ traffic, settings }) => {
  const explain: ComponentFacts = {
    errorRate: traffic.errorRate,
    errorCount: traffic.errorCount,
    totalRequests: traffic.totalRequests,
    ceiling: settings.errorRateCeiling,
  };
  if (!Number.isFinite(settings.errorRateCeiling) || settings.errorRateCeiling <= 0) {
    return degraded('error rate ceiling is not configured', explain);
  }
  if (!Number.isFinite(traffic.errorRate)) {
    return degraded('error rate could not be computed', explain);
  }
  if (traffic.totalRequests === 0) {
    return { score: 100, facts: { ...explain, reason: 'no traffic in range' } };
  }
  return { score: clampScore(100 * (1 - traffic.errorRate / settings.errorRateCeiling)), facts: explain };
};

export const scoreSslTls: ComponentScorer = ({ facts }) => {
  const side = (httpsOnly: boolean, ratio: number | null): number => {
    if (httpsOnly) return 100;
    return ratio === null ? 0 : round2(ratio * 100);
  };
  const client = side(facts.clientSsl, facts.clientHttpsRatio);
  const backend = side(facts.backendSsl, facts.backendHttpsRatio);

  return {
    score: clampScore(SSL_CLIENT_SHARE * client + SSL_BACKEND_SHARE * backend),
    facts: {
      clientScore: client,
      backendScore: backend,
      clientHttpsOnly: facts.clientSsl,
      backendHttpsOnly: facts.backendSsl,
      nonHttpsBackends: facts.nonHttpsBackends,
    },
  };
};

export const scoreLogging: ComponentScorer = ({ sensitiveData }) => {
  const explain: ComponentFacts = {
    matchPercentage: sensitiveData.matchPercentage,
    matchingEntries: sensitiveData.matchingEntries,
    totalEntries: sensitiveData.totalEntries,
    keywords: sensitiveData.keywords.map((k) => k.keyword),
  };
  if (sensitiveData.noData) {
    return { score: 100, facts: { ...explain, reason: 'no log entries to scan' } };
  }
  if (!Number.isFinite(sensitiveData.matchPercentage)) {
    return degraded('match percentage could not be computed', explain);
  }
  return { score: loggingScoreFor(sensitiveData.matchPercentage), facts: explain };
};

export const SCORERS: Record<ComponentId, ComponentScorer> = {
  ip_whitelist_coverage: scoreIpWhitelist,
  throttling_configured: scoreThrottling,
  quota_configured: scoreQuota,
  authentication_strength: scoreAuthentication,
  allowed_hours: scoreAllowedHours,
  traffic_anomaly: scoreTrafficAnomaly,
  error_rate: scoreErrorRate,
  ssl_tls_status: scoreSslTls,
  logging_status: scoreLogging,
};
