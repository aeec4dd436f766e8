// ============================================================================
// Traffic Anomaly Analyzer - hour-of-day histogram, error rate, outlier hours
// ============================================================================

import { round2 } from '../../core/components';
import { hourResolver } from '../../utils/time';
import { sourceIpOf, TimedEntry } from '../facts/fact-extractor';
import { TrafficStats } from '../../types';

export interface TrafficAnalysisOptions {
  timezone: string;
  anomalyK: number;
  errorStatusFloor: number;
  droppedEntries?: number;
}

export interface TrafficAnalysis {
  stats: TrafficStats;
  timezoneFallback: boolean;
}

const PEAK_HOUR_COUNT = 5;

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

/** Population standard deviation. */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length);
}

/**
 * Hours whose count exceeds mean + k·stddev across the 24 buckets. A flat
 * histogram (stddev 0) has no outliers.
 */
export function detectAnomalousHours(buckets: readonly number[], k: number): number[] {
  const m = mean(buckets);
  const sd = stdDev(buckets);
  if (sd === 0) return [];
  const threshold = m + k * sd;
  return buckets.flatMap((count, hour) => (count > threshold ? [hour] : []));
}

export function peakHours(buckets: readonly number[]): number[] {
  return buckets
    .map((count, hour) => ({ hour, count }))
    .filter((b) => b.count > 0)
    .sort((a, b) => b.count - a.count || a.hour - b.hour)
    .slice(0, PEAK_HOUR_COUNT)
    .map((b) => b.hour)
    .sort((a, b) => a - b);
}

export function analyzeTraffic(entries: readonly TimedEntry[], options: TrafficAnalysisOptions): TrafficAnalysis {
  const resolved = hourResolver(options.timezone);
  const timezoneFallback = resolved === null;
  const hourOf = resolved ?? ((date: Date) => date.getUTCHours());

  const buckets = new Array<number>(24).fill(0);
  const statusCounts = new Map<number, number>();
  const ips = new Set<string>();
  let errorCount = 0;

  for (const { entry, at } of entries) {
    buckets[hourOf(at)]++;
    statusCounts.set(entry.statusCode, (statusCounts.get(entry.statusCode) ?? 0) + 1);
    if (entry.statusCode >= options.errorStatusFloor) errorCount++;
    const ip = sourceIpOf(entry);
    if (ip) ips.add(ip);
  }

  const totalRequests = entries.length;
  const m = mean(buckets);
  const sd = stdDev(buckets);

  const statusCodes: Record<string, number> = {};
  for (const code of [...statusCounts.keys()].sort((a, b) => a - b)) {
    statusCodes[String(code)] = statusCounts.get(code) ?? 0;
  }

  return {
    timezoneFallback,
    stats: {
      totalRequests,
      hourlyBuckets: buckets,
      errorCount,
      errorRate: totalRequests === 0 ? 0 : round2((errorCount / totalRequests) * 100),
      anomalousHours: detectAnomalousHours(buckets, options.anomalyK),
      mean: round2(m),
      stdDev: round2(sd),
      threshold: round2(m + options.anomalyK * sd),
      peakHours: peakHours(buckets),
      maxHourlyRequests: Math.max(...buckets),
      uniqueSourceIps: ips.size,
      statusCodes,
      droppedEntries: options.droppedEntries ?? 0,
      timezone: timezoneFallback ? 'UTC' : options.timezone,
    },
  };
}
