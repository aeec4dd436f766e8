// ============================================================================
// Data Sources - read-only access to endpoint configs and traffic logs
// ============================================================================

import { parseTimestamp, isWithinRange } from '../utils/time';
import { EndpointConfig, EndpointSummary, TimeRange, TrafficEntry } from '../types';

export interface EndpointConfigSource {
  list(): Promise<EndpointSummary[]>;
  get(endpointId: string): Promise<EndpointConfig | null>;
}

export interface TrafficLogSource {
  /** Newest-first pages of entries for the endpoint within the range. */
  pages(endpointId: string, range: TimeRange, pageSize: number): AsyncIterable<TrafficEntry[]>;
}

/**
 * Drains pages until `limit` entries are collected. Returns whether the
 * sample was truncated so callers can report it.
 */
export async function collectSample(
  source: TrafficLogSource,
  endpointId: string,
  range: TimeRange,
  options: { limit: number; pageSize: number },
): Promise<{ sample: TrafficEntry[]; truncated: boolean }> {
  const sample: TrafficEntry[] = [];
  const pageSize = Math.max(1, Math.min(options.pageSize, options.limit));

  for await (const page of source.pages(endpointId, range, pageSize)) {
    for (const entry of page) {
      if (sample.length >= options.limit) {
        return { sample, truncated: true };
      }
      sample.push(entry);
    }
  }
  return { sample, truncated: false };
}

// ---------------------------------------------------------------------------
// In-memory implementations (offline scoring, tests)
// ---------------------------------------------------------------------------
export class InMemoryEndpointConfigSource implements EndpointConfigSource {
  private readonly configs = new Map<string, EndpointConfig>();

  constructor(configs: readonly EndpointConfig[] = []) {
    for (const config of configs) this.configs.set(config.id, config);
  }

  put(config: EndpointConfig): void {
    this.configs.set(config.id, config);
  }

  async list(): Promise<EndpointSummary[]> {
    return [...this.configs.values()]
      .map((c) => ({ id: c.id, name: c.name, authMethod: String(c.authMethod) }))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async get(endpointId: string): Promise<EndpointConfig | null> {
    return this.configs.get(endpointId) ?? null;
  }
}

export class InMemoryTrafficLogSource implements TrafficLogSource {
  private readonly logs = new Map<string, TrafficEntry[]>();

  constructor(logs: Record<string, TrafficEntry[]> = {}) {
    for (const [endpointId, entries] of Object.entries(logs)) this.logs.set(endpointId, entries);
  }

  append(endpointId: string, entries: readonly TrafficEntry[]): void {
    this.logs.set(endpointId, [...(this.logs.get(endpointId) ?? []), ...entries]);
  }

  async *pages(endpointId: string, range: TimeRange, pageSize: number): AsyncIterable<TrafficEntry[]> {
    const inRange = (this.logs.get(endpointId) ?? [])
      .map((entry) => ({ entry, at: parseTimestamp(entry.timestamp) }))
      .filter((e): e is { entry: TrafficEntry; at: Date } => e.at !== null && isWithinRange(e.at, range))
      .sort((a, b) => b.at.getTime() - a.at.getTime())
      .map((e) => e.entry);

    for (let offset = 0; offset < inRange.length; offset += pageSize) {
      yield inRange.slice(offset, offset + pageSize);
    }
  }
}

/**
 * Passes entries through untouched for callers that already hold a full
 * log (score-file); range filtering is left to the engine, which counts
 * what it drops.
 */
export class StaticTrafficLogSource implements TrafficLogSource {
  constructor(private readonly entries: readonly TrafficEntry[]) {}

  async *pages(_endpointId: string, _range: TimeRange, pageSize: number): AsyncIterable<TrafficEntry[]> {
    for (let offset = 0; offset < this.entries.length; offset += pageSize) {
      yield this.entries.slice(offset, offset + pageSize);
    }
  }
}
