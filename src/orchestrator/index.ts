// ============================================================================
// Orchestrator - Endpoint Scoring Coordinator
// ============================================================================
//
// WORKFLOW:
//   1. Validate the requested time range (before any data access)
//   2. Load the endpoint config snapshot (404 when absent)
//   3. Page the traffic sample from the log source up to the sample cap
//   4. Capture the current keyword snapshot
//   5. Run the scoring engine
//   6. Log a summary
//
// Batch scoring runs the same flow per endpoint with bounded concurrency;
// one endpoint failing does not affect the others.
//
// ============================================================================

import { Logger } from '../utils/logger';
import { createTimeRange as buildTimeRange, validateTimeRange } from '../utils/time';
import { ScoringEngine } from '../core/scoring-engine';
import { MissingDataError, errorMessage, isPostureError } from '../core/errors';
import { KeywordStore } from '../store/keyword-store';
import { EndpointConfigSource, TrafficLogSource, collectSample } from '../store/sources';
import { CompositeScoreResult, TimeRange } from '../types';

export interface OrchestratorOptions {
  sampleLimit?: number;
  pageSize?: number;
  concurrency?: number;
  defaultRangeDays?: number;
  maxRangeDays?: number;
  now?: () => Date;
}

export type BatchItem =
  | { endpointId: string; status: 'scored'; result: CompositeScoreResult }
  | { endpointId: string; status: 'failed'; error: { code: string; message: string } };

export interface BatchProgress {
  completed: number;
  total: number;
  item: BatchItem;
}

export class ScoringOrchestrator {
  private logger = new Logger('orchestrator');
  private readonly sampleLimit: number;
  private readonly pageSize: number;
  private readonly concurrency: number;
  private readonly defaultRangeDays: number;
  readonly maxRangeDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly engine: ScoringEngine,
    private readonly configs: EndpointConfigSource,
    private readonly logs: TrafficLogSource,
    private readonly keywords: KeywordStore,
    options: OrchestratorOptions = {},
  ) {
    this.sampleLimit = options.sampleLimit ?? 10_000;
    this.pageSize = options.pageSize ?? 1_000;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.defaultRangeDays = options.defaultRangeDays ?? 7;
    this.maxRangeDays = options.maxRangeDays ?? 90;
    this.now = options.now ?? (() => new Date());
  }

  /** Range from optional request bounds; defaults to the trailing window. */
  createTimeRange(start?: string, end?: string): TimeRange {
    return buildTimeRange(start, end, {
      now: this.now(),
      defaultDays: this.defaultRangeDays,
      maxDays: this.maxRangeDays,
    });
  }

  // ---------------------------------------------------------------------------
  // Single Endpoint
  // ---------------------------------------------------------------------------
  async scoreEndpoint(endpointId: string, range: TimeRange): Promise<CompositeScoreResult> {
    validateTimeRange(range, this.maxRangeDays);
    const startTime = Date.now();

    const config = await this.configs.get(endpointId);
    if (!config) {
      throw new MissingDataError(`No configuration found for endpoint ${endpointId}`);
    }

    const { sample, truncated } = await collectSample(this.logs, endpointId, range, {
      limit: this.sampleLimit,
      pageSize: this.pageSize,
    });
    if (truncated) {
      this.logger.warn(`Traffic sample for ${endpointId} capped at ${this.sampleLimit} entries`);
    }

    const snapshot = this.keywords.current();
    const result = this.engine.score(config, sample, range, snapshot);

    this.logSummary(result, sample.length, Date.now() - startTime);
    return result;
  }

  // ---------------------------------------------------------------------------
  // Batch
  // ---------------------------------------------------------------------------
  async scoreMany(
    endpointIds: readonly string[],
    range: TimeRange,
    options: { concurrency?: number; onProgress?: (progress: BatchProgress) => void } = {},
  ): Promise<BatchItem[]> {
    validateTimeRange(range, this.maxRangeDays);

    const ids = [...new Set(endpointIds)];
    const items: BatchItem[] = new Array(ids.length);
    const workers = Math.max(1, Math.min(options.concurrency ?? this.concurrency, ids.length));
    let next = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (next < ids.length) {
        const index = next++;
        const item = await this.scoreOne(ids[index], range);
        items[index] = item;
        completed++;
        options.onProgress?.({ completed, total: ids.length, item });
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    const failed = items.filter((i) => i.status === 'failed').length;
    this.logger.info(`Batch scored ${ids.length - failed}/${ids.length} endpoint(s)`, { failed });
    return items;
  }

  private async scoreOne(endpointId: string, range: TimeRange): Promise<BatchItem> {
    try {
      return { endpointId, status: 'scored', result: await this.scoreEndpoint(endpointId, range) };
    } catch (error) {
      this.logger.error(`Scoring ${endpointId} failed`, { error: errorMessage(error) });
      return {
        endpointId,
        status: 'failed',
        error: {
          code: isPostureError(error) ? error.code : 'INTERNAL_ERROR',
          message: errorMessage(error),
        },
      };
    }
  }

  // ---------------------------------------------------------------------------
  // Summary Logging
  // ---------------------------------------------------------------------------
  private logSummary(result: CompositeScoreResult, sampleSize: number, totalMs: number): void {
    const below = result.recommendations.length;
    this.logger.info(`Scored ${result.endpointId}: ${result.overallScore}/100 (${result.level})`, {
      sampleSize,
      dropped: result.traffic.droppedEntries,
      recommendations: below,
      keywordSetVersion: result.keywordSetVersion,
      durationMs: totalMs,
    });
  }
}
