// ============================================================================
// Application Configuration - environment variables -> typed settings
// ============================================================================

import { Logger } from '../utils/logger';
import { ConfigurationError } from '../core/errors';
import { validateWeights } from '../core/components';
import { defaultScoringSettings } from '../core/scoring-engine';
import { KeywordMatchMode, NotificationConfig, ScoringSettings } from '../types';

const logger = new Logger('config');

export interface AppConfig {
  port: number;
  host: string;
  corsOrigin: string;
  publicBaseUrl: string;
  databaseUrl?: string;
  redisUrl?: string;
  keywordSource: string;
  scoring: ScoringSettings;
  sampleLimit: number;
  pageSize: number;
  scoringConcurrency: number;
  defaultRangeDays: number;
  maxRangeDays: number;
  shareTtlDays: number;
  keywordReloadCron: string;
  sharePurgeCron: string;
  digest: { cron?: string; endpointIds: string[]; recipients: string[] };
  notifications: NotificationConfig;
  openaiApiKey?: string;
}

type Env = Record<string, string | undefined>;

function numberFrom(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`Ignoring non-numeric ${key}, using default`, { value: raw, default: fallback });
    return fallback;
  }
  return value;
}

function listFrom(env: Env, key: string): string[] {
  return (env[key] || '').split(',').map((s) => s.trim()).filter(Boolean);
}

function matchModeFrom(env: Env): KeywordMatchMode {
  const raw = (env.KEYWORD_MATCH_MODE || 'substring').toLowerCase();
  if (raw === 'substring' || raw === 'word') return raw;
  logger.warn('Unknown KEYWORD_MATCH_MODE, using substring', { value: raw });
  return 'substring';
}

/** SCORE_WEIGHTS is a JSON object keyed by component id. Invalid input is fatal. */
export function weightsFrom(env: Env): ScoringSettings['weights'] {
  const raw = env.SCORE_WEIGHTS;
  if (!raw || raw.trim() === '') return defaultScoringSettings().weights;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError('SCORE_WEIGHTS is not valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError('SCORE_WEIGHTS must be a JSON object');
  }

  const weights: Record<string, number> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'number') {
      throw new ConfigurationError(`SCORE_WEIGHTS.${key} must be a number`);
    }
    weights[key] = value;
  }
  return validateWeights(weights);
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const defaults = defaultScoringSettings();
  const port = numberFrom(env, 'PORT', numberFrom(env, 'DASHBOARD_PORT', 3001));

  const smtpHost = env.SMTP_HOST;
  const recipients = listFrom(env, 'DIGEST_RECIPIENTS');

  return {
    port,
    host: env.HOST || '0.0.0.0',
    corsOrigin: env.CORS_ORIGIN || '*',
    publicBaseUrl: (env.PUBLIC_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, ''),
    databaseUrl: env.DATABASE_URL || undefined,
    redisUrl: env.REDIS_URL || undefined,
    keywordSource: env.SENSITIVE_KEYWORDS_SOURCE || env.SENSITIVE_KEYWORDS_FILE || 'config/sensitive-keywords.txt',
    scoring: {
      anomalyK: numberFrom(env, 'ANOMALY_K', defaults.anomalyK),
      anomalyPenaltyPerHour: numberFrom(env, 'ANOMALY_PENALTY_PER_HOUR', defaults.anomalyPenaltyPerHour),
      errorRateCeiling: numberFrom(env, 'ERROR_RATE_CEILING', defaults.errorRateCeiling),
      errorStatusFloor: numberFrom(env, 'ERROR_STATUS_FLOOR', defaults.errorStatusFloor),
      safeThrottlePerHour: numberFrom(env, 'SAFE_THROTTLE_PER_HOUR', defaults.safeThrottlePerHour),
      keywordMatchMode: matchModeFrom(env),
      weights: weightsFrom(env),
    },
    sampleLimit: numberFrom(env, 'SAMPLE_LIMIT', 10_000),
    pageSize: numberFrom(env, 'PAGE_SIZE', 1_000),
    scoringConcurrency: numberFrom(env, 'SCORING_CONCURRENCY', 4),
    defaultRangeDays: numberFrom(env, 'DEFAULT_RANGE_DAYS', 7),
    maxRangeDays: numberFrom(env, 'MAX_RANGE_DAYS', 90),
    shareTtlDays: numberFrom(env, 'SHARE_TTL_DAYS', 30),
    keywordReloadCron: env.KEYWORD_RELOAD_CRON || '*/15 * * * *',
    sharePurgeCron: env.SHARE_PURGE_CRON || '0 3 * * *',
    digest: {
      cron: env.DIGEST_CRON || undefined,
      endpointIds: listFrom(env, 'DIGEST_ENDPOINT_IDS'),
      recipients,
    },
    notifications: {
      email: smtpHost
        ? {
            recipients,
            smtpConfig: {
              host: smtpHost,
              port: numberFrom(env, 'SMTP_PORT', 587),
              secure: env.SMTP_SECURE === 'true',
              auth: { user: env.SMTP_USER || '', pass: env.SMTP_PASS || '' },
              from: env.SMTP_FROM || env.SMTP_USER || 'api-posture@localhost',
            },
          }
        : undefined,
      slack: env.SLACK_WEBHOOK_URL
        ? { webhookUrl: env.SLACK_WEBHOOK_URL, channel: env.SLACK_CHANNEL || undefined }
        : undefined,
    },
    openaiApiKey: env.OPENAI_API_KEY || undefined,
  };
}
