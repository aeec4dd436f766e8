// ============================================================================
// Runtime - wires stores, engine and services from the app configuration
// ============================================================================

import { Pool } from 'pg';
import Redis from 'ioredis';
import { Logger } from '../utils/logger';
import { AppConfig } from '../config';
import { ConfigurationError, errorMessage } from './errors';
import { ScoringEngine } from './scoring-engine';
import { KeywordStore, keywordSourceFor } from '../store/keyword-store';
import { ShareStore } from '../store/share-store';
import { EndpointConfigSource, TrafficLogSource } from '../store/sources';
import {
  PostgresEndpointConfigSource, PostgresTrafficLogSource, createPool, initializeSchema,
} from '../store/postgres-sources';
import { ScoringOrchestrator } from '../orchestrator';
import { ReportGenerator } from '../agents/report/report-generator';
import { NotificationService } from '../integrations/notification-service';

const logger = new Logger('runtime');

export interface Runtime {
  config: AppConfig;
  pool?: Pool;
  redis?: Redis;
  configs: EndpointConfigSource;
  logs: TrafficLogSource;
  keywords: KeywordStore;
  engine: ScoringEngine;
  orchestrator: ScoringOrchestrator;
  shares: ShareStore;
  reports: ReportGenerator;
  notifications: NotificationService;
  close(): Promise<void>;
}

/**
 * Builds the PostgreSQL-backed runtime. Weights were validated by
 * loadAppConfig; the keyword set is not loaded here.
 */
export function createRuntime(config: AppConfig): Runtime {
  if (!config.databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required for the endpoint config and traffic log stores');
  }

  const pool = createPool(config.databaseUrl);
  const redis = config.redisUrl ? new Redis(config.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 2 }) : undefined;

  const configs = new PostgresEndpointConfigSource(pool);
  const logs = new PostgresTrafficLogSource(pool);
  const keywords = new KeywordStore(keywordSourceFor(config.keywordSource));
  const engine = new ScoringEngine(config.scoring);

  return {
    config,
    pool,
    redis,
    configs,
    logs,
    keywords,
    engine,
    orchestrator: new ScoringOrchestrator(engine, configs, logs, keywords, {
      sampleLimit: config.sampleLimit,
      pageSize: config.pageSize,
      concurrency: config.scoringConcurrency,
      defaultRangeDays: config.defaultRangeDays,
      maxRangeDays: config.maxRangeDays,
    }),
    shares: new ShareStore({ pool, redis, ttlDays: config.shareTtlDays }),
    reports: new ReportGenerator({ openaiApiKey: config.openaiApiKey }),
    notifications: new NotificationService(config.notifications),
    async close() {
      await pool.end();
      if (redis) redis.disconnect();
    },
  };
}

/** Creates tables when missing. Failures are logged; scoring reports them per request. */
export async function prepareStores(runtime: Runtime): Promise<void> {
  if (!runtime.pool) return;
  try {
    await initializeSchema(runtime.pool);
    await runtime.shares.initializeSchema();
  } catch (error) {
    logger.error('DB init failed (will surface on first request)', { error: errorMessage(error) });
  }
}
