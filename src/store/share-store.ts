// ============================================================================
// Share Store - PostgreSQL + Redis (TTL) for shareable score snapshots,
// with a filesystem fallback when neither is configured
// ============================================================================

import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import Redis from 'ioredis';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { Logger } from '../utils/logger';
import { SourceError, errorMessage } from '../core/errors';
import { CompositeScoreResult, SharedSnapshot } from '../types';

const DAY_MS = 86_400_000;

export interface ShareStoreOptions {
  pool?: Pool;
  redis?: Redis;
  directory?: string;
  ttlDays?: number;
  now?: () => Date;
}

export function isSharedSnapshot(value: unknown): value is SharedSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return typeof record.token === 'string'
    && typeof record.endpointId === 'string'
    && typeof record.createdAt === 'string'
    && typeof record.expiresAt === 'string'
    && typeof record.result === 'object'
    && record.result !== null;
}

function parseSnapshot(raw: string): SharedSnapshot | null {
  const parsed: unknown = JSON.parse(raw);
  return isSharedSnapshot(parsed) ? parsed : null;
}

export class ShareStore {
  private logger = new Logger('share-store');
  private readonly pool?: Pool;
  private readonly redis?: Redis;
  private readonly directory: string;
  private readonly ttlDays: number;
  private readonly now: () => Date;

  constructor(options: ShareStoreOptions = {}) {
    this.pool = options.pool;
    this.redis = options.redis;
    this.directory = options.directory ?? path.join(process.cwd(), 'shared-reports');
    this.ttlDays = options.ttlDays ?? 30;
    this.now = options.now ?? (() => new Date());
  }

  get usesFileFallback(): boolean {
    return !this.pool && !this.redis;
  }

  // ---------------------------------------------------------------------------
  // Save Snapshot
  // ---------------------------------------------------------------------------
  async save(result: CompositeScoreResult): Promise<SharedSnapshot> {
    const created = this.now();
    const snapshot: SharedSnapshot = {
      token: uuidv4(),
      endpointId: result.endpointId,
      createdAt: created.toISOString(),
      expiresAt: new Date(created.getTime() + this.ttlDays * DAY_MS).toISOString(),
      result,
    };
    const payload = JSON.stringify(snapshot);
    let persisted = 0;

    // PostgreSQL for the durable copy
    if (this.pool) {
      try {
        await this.pool.query(
          `INSERT INTO shared_reports (token, endpoint_id, created_at, expires_at, snapshot)
           VALUES ($1, $2, $3, $4, $5)`,
          [snapshot.token, snapshot.endpointId, snapshot.createdAt, snapshot.expiresAt, payload],
        );
        persisted++;
      } catch (error) {
        this.logger.error('Failed to save share snapshot to PostgreSQL', { error: errorMessage(error) });
      }
    }

    // Redis expires the key on its own
    if (this.redis) {
      try {
        await this.redis.set(this.key(snapshot.token), payload, 'EX', Math.round(this.ttlDays * 86_400));
        persisted++;
      } catch (error) {
        this.logger.error('Failed to cache share snapshot in Redis', { error: errorMessage(error) });
      }
    }

    if (this.usesFileFallback) {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(this.filePath(snapshot.token), payload, 'utf-8');
      persisted++;
    }

    if (persisted === 0) {
      throw new SourceError('Share snapshot could not be stored', 'save share snapshot');
    }

    this.logger.info(`Share link created for ${snapshot.endpointId}`, { expiresAt: snapshot.expiresAt });
    return snapshot;
  }

  // ---------------------------------------------------------------------------
  // Get Snapshot (Redis -> PostgreSQL -> file)
  // ---------------------------------------------------------------------------
  async get(token: string): Promise<SharedSnapshot | null> {
    if (!isUuid(token)) return null;

    const snapshot = await this.lookup(token);
    if (!snapshot) return null;
    if (Date.parse(snapshot.expiresAt) <= this.now().getTime()) {
      this.logger.debug('Share snapshot expired', { token });
      return null;
    }
    return snapshot;
  }

  private async lookup(token: string): Promise<SharedSnapshot | null> {
    if (this.redis) {
      try {
        const cached = await this.redis.get(this.key(token));
        if (cached) return parseSnapshot(cached);
      } catch (error) {
        this.logger.warn('Redis lookup failed', { error: errorMessage(error) });
      }
    }

    if (this.pool) {
      try {
        const result = await this.pool.query<{ snapshot: unknown }>(
          'SELECT snapshot FROM shared_reports WHERE token = $1',
          [token],
        );
        const stored = result.rows[0]?.snapshot;
        if (isSharedSnapshot(stored)) return stored;
      } catch (error) {
        this.logger.warn('PostgreSQL lookup failed', { error: errorMessage(error) });
      }
    }

    if (this.usesFileFallback) {
      try {
        return parseSnapshot(await fs.readFile(this.filePath(token), 'utf-8'));
      } catch (error) {
        this.logger.debug('No stored share snapshot', { token, error: errorMessage(error) });
      }
    }

    return null;
  }

  /** Removes expired rows or fallback files; Redis keys expire by TTL. */
  async purgeExpired(): Promise<number> {
    if (this.pool) {
      const result = await this.pool.query('DELETE FROM shared_reports WHERE expires_at <= $1', [this.now()]);
      return result.rowCount ?? 0;
    }
    if (!this.usesFileFallback) return 0;

    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      this.logger.debug('No share directory to purge', { error: errorMessage(error) });
      return 0;
    }

    let removed = 0;
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const file = path.join(this.directory, name);
      const snapshot = parseSnapshot(await fs.readFile(file, 'utf-8'));
      if (snapshot && new Date(snapshot.expiresAt) <= this.now()) {
        await fs.rm(file, { force: true });
        removed += 1;
      }
    }
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Database Schema Setup
  // ---------------------------------------------------------------------------
  async initializeSchema(): Promise<void> {
    if (!this.pool) return;

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS shared_reports (
        token UUID PRIMARY KEY,
        endpoint_id VARCHAR(100) NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL,
        expires_at TIMESTAMP WITH TIME ZONE NOT NULL,
        snapshot JSONB NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_shared_reports_expiry ON shared_reports(expires_at);
    `);

    this.logger.info('Share schema initialized');
  }

  private key(token: string): string {
    return `share:${token}`;
  }

  private filePath(token: string): string {
    return path.join(this.directory, `${token}.json`);
  }
}
