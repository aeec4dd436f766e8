// ============================================================================
// Scheduler - Cron-based keyword reload, share expiry and posture digests
// ============================================================================

import 'dotenv/config';
import cron, { ScheduledTask } from 'node-cron';
import { Logger } from '../utils/logger';
import { errorMessage } from '../core/errors';
import { loadAppConfig } from '../config';
import { Runtime, createRuntime, prepareStores } from '../core/runtime';
import { KeywordStore } from '../store/keyword-store';
import { ShareStore } from '../store/share-store';
import { DeliveryResult } from '../types';

const logger = new Logger('scheduler');

// ---------------------------------------------------------------------------
// Keyword Reload
// ---------------------------------------------------------------------------
export function scheduleKeywordReload(keywords: KeywordStore, expression: string): ScheduledTask | null {
  if (!cron.validate(expression)) {
    logger.warn(`Invalid KEYWORD_RELOAD_CRON "${expression}", keyword reload disabled`);
    return null;
  }

  logger.info(`Scheduling keyword reload with cron: ${expression}`);
  // reload() logs and keeps the previous set on failure
  return cron.schedule(expression, async () => {
    await keywords.reload();
  });
}

// ---------------------------------------------------------------------------
// Share Expiry
// ---------------------------------------------------------------------------
export async function purgeExpiredShares(shares: ShareStore): Promise<number> {
  const removed = await shares.purgeExpired();
  logger.info(`Purged ${removed} expired share snapshot(s)`);
  return removed;
}

export function scheduleSharePurge(shares: ShareStore, expression: string): ScheduledTask | null {
  if (!cron.validate(expression)) {
    logger.warn(`Invalid SHARE_PURGE_CRON "${expression}", share purge disabled`);
    return null;
  }

  logger.info(`Scheduling share purge with cron: ${expression}`);
  return cron.schedule(expression, async () => {
    try {
      await purgeExpiredShares(shares);
    } catch (error) {
      logger.error('Share purge failed', { error: errorMessage(error) });
    }
  });
}

// ---------------------------------------------------------------------------
// Digest
// ---------------------------------------------------------------------------
export interface DigestOutcome {
  endpointId: string;
  overallScore?: number;
  deliveries: DeliveryResult[];
  error?: string;
}

/** Scores each digest endpoint over the default window and sends its report. */
export async function runDigest(runtime: Pick<Runtime, 'orchestrator' | 'reports' | 'notifications'>, endpointIds: readonly string[]): Promise<DigestOutcome[]> {
  const { orchestrator, reports, notifications } = runtime;
  logger.info(`=== Scheduled digest triggered (${endpointIds.length} endpoint(s)) ===`);

  const range = orchestrator.createTimeRange();
  const items = await orchestrator.scoreMany(endpointIds, range);
  const outcomes: DigestOutcome[] = [];

  for (const item of items) {
    if (item.status === 'failed') {
      outcomes.push({ endpointId: item.endpointId, deliveries: [], error: item.error.message });
      continue;
    }
    const report = await reports.build(item.result);
    outcomes.push({
      endpointId: item.endpointId,
      overallScore: item.result.overallScore,
      deliveries: await notifications.notify(report),
    });
  }

  return outcomes;
}

export function scheduleDigest(runtime: Runtime): ScheduledTask | null {
  const { cron: expression, endpointIds } = runtime.config.digest;

  if (!expression) return null;
  if (endpointIds.length === 0) {
    logger.warn('DIGEST_CRON is set but DIGEST_ENDPOINT_IDS is empty, digest disabled');
    return null;
  }
  if (!cron.validate(expression)) {
    logger.warn(`Invalid DIGEST_CRON "${expression}", digest disabled`);
    return null;
  }

  logger.info(`Scheduling digest for ${endpointIds.length} endpoint(s) with cron: ${expression}`);
  return cron.schedule(expression, async () => {
    try {
      await runDigest(runtime, endpointIds);
    } catch (error) {
      logger.error('Scheduled digest failed', { error: errorMessage(error) });
    }
  }, {
    timezone: process.env.DIGEST_TIMEZONE || 'UTC',
  });
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------
async function main(): Promise<void> {
  const config = loadAppConfig();
  const runtime = createRuntime(config);
  await runtime.keywords.load();
  await prepareStores(runtime);

  scheduleKeywordReload(runtime.keywords, config.keywordReloadCron);
  scheduleSharePurge(runtime.shares, config.sharePurgeCron);
  scheduleDigest(runtime);
  logger.info('Scheduler started');
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('Failed to start scheduler', { error: errorMessage(err) });
    process.exit(1);
  });
}
