import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import axios, { AxiosInstance } from 'axios';
import { createDashboardServer } from './server';
import { ScoringOrchestrator } from '../orchestrator';
import { ScoringEngine } from '../core/scoring-engine';
import { KeywordStore } from '../store/keyword-store';
import { ShareStore } from '../store/share-store';
import { InMemoryEndpointConfigSource, InMemoryTrafficLogSource } from '../store/sources';
import { ReportGenerator } from '../agents/report/report-generator';
import { NotificationService } from '../integrations/notification-service';
import { endpointConfig, flatDay, weakConfig, weakSample } from '../testing/fixtures';

const RANGE_QUERY = { start_date: '2024-03-01', end_date: '2024-03-07' };

describe('dashboard API', () => {
  let shareDir: string;
  let client: AxiosInstance;
  let close: () => Promise<void>;

  beforeAll(async () => {
    shareDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dashboard-shares-'));

    const configs = new InMemoryEndpointConfigSource([endpointConfig(), weakConfig()]);
    const keywords = new KeywordStore({ describe: () => 'inline', read: async () => 'password,api_key,credit_card' });
    await keywords.load();

    const { server, io } = createDashboardServer({
      orchestrator: new ScoringOrchestrator(
        new ScoringEngine(),
        configs,
        new InMemoryTrafficLogSource({ 'orders-api': flatDay(), 'legacy-api': weakSample() }),
        keywords,
        { now: () => new Date('2024-03-08T00:00:00.000Z') },
      ),
      configs,
      keywords,
      shares: new ShareStore({ directory: shareDir }),
      reports: new ReportGenerator({ openaiApiKey: '' }),
      notifications: new NotificationService(),
      publicBaseUrl: 'http://posture.test',
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }

    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    close = async () => {
      await io.close();
    };
  });

  afterAll(async () => {
    await close();
    await fs.rm(shareDir, { recursive: true, force: true });
  });

  it('should report health with the keyword set version', async () => {
    const res = await client.get('/api/health');
    expect(res.status).toBe(200);
    expect(res.data.status).toBe('ok');
    expect(res.data.keywordSetVersion).toBe(1);
  });

  it('should list endpoints', async () => {
    const res = await client.get('/api/endpoints');
    expect(res.data.map((e: { id: string }) => e.id)).toEqual(['legacy-api', 'orders-api']);
  });

  it('should score an endpoint over the requested window', async () => {
    const res = await client.get('/api/endpoints/legacy-api/score', { params: RANGE_QUERY });
    expect(res.status).toBe(200);
    expect(res.data.overallScore).toBe(14.75);
    expect(res.data.level).toBe('Critical');
    expect(res.data.timeRange).toEqual({ start: '2024-03-01T00:00:00.000Z', end: '2024-03-07T23:59:59.999Z' });
  });

  it('should return 404 for an unknown endpoint', async () => {
    const res = await client.get('/api/endpoints/ghost-api/score', { params: RANGE_QUERY });
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'No configuration found for endpoint ghost-api', code: 'MISSING_DATA' });
  });

  it('should return 400 for an inverted window', async () => {
    const res = await client.get('/api/endpoints/orders-api/score', {
      params: { start_date: '2024-03-07', end_date: '2024-03-01' },
    });
    expect(res.status).toBe(400);
    expect(res.data.code).toBe('VALIDATION_FAILED');
  });

  it('should export an HTML report as an attachment', async () => {
    const res = await client.get('/api/endpoints/legacy-api/export/html', { params: RANGE_QUERY });
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(res.headers['content-disposition'])
      .toBe('attachment; filename="api-security-legacy-api-2024-03-01_2024-03-07.html"');
    expect(res.data).toContain('API Security Report - Legacy API');
  });

  it('should reject unsupported export formats', async () => {
    const res = await client.get('/api/endpoints/legacy-api/export/pdf');
    expect(res.status).toBe(400);
    expect(res.data.error).toBe('Unsupported export format: pdf (expected json or html)');
  });

  it('should create and resolve share links', async () => {
    const created = await client.post('/api/endpoints/legacy-api/share', RANGE_QUERY);
    expect(created.status).toBe(201);
    expect(created.data.shareUrl).toBe(`http://posture.test/api/shared/${created.data.token}`);
    expect(created.data.emailSent).toBe(false);

    const shared = await client.get(`/api/shared/${created.data.token}`);
    expect(shared.status).toBe(200);
    expect(shared.data.result.overallScore).toBe(14.75);
  });

  it('should return 404 for unknown share tokens', async () => {
    const res = await client.get('/api/shared/not-a-token');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'Shared report not found or expired', code: 'MISSING_DATA' });
  });

  it('should score a batch and report failures per endpoint', async () => {
    const res = await client.post('/api/scores/batch', { ...RANGE_QUERY, endpointIds: ['orders-api', 'ghost-api'] });
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ total: 2, scored: 1, failed: 1 });
    expect(res.data.items).toEqual([
      { endpointId: 'orders-api', status: 'scored', overallScore: 96, level: 'Excellent' },
      {
        endpointId: 'ghost-api',
        status: 'failed',
        error: { code: 'MISSING_DATA', message: 'No configuration found for endpoint ghost-api' },
      },
    ]);
  });

  it('should validate batch requests', async () => {
    const res = await client.post('/api/scores/batch', { endpointIds: [] });
    expect(res.status).toBe(400);
    expect(res.data.code).toBe('VALIDATION_FAILED');
  });

  it('should build portfolio and compliance roll-ups', async () => {
    const body = { ...RANGE_QUERY, endpointIds: ['orders-api', 'legacy-api'] };

    const portfolio = await client.post('/api/reports/portfolio', body);
    expect(portfolio.data.summary.averageScore).toBe(55.38);
    expect(portfolio.data.failed).toEqual([]);

    const compliance = await client.post('/api/reports/compliance', body);
    expect(compliance.data.report.compliancePercentage).toBe(50);
  });

  it('should expose and reload the keyword set', async () => {
    const current = await client.get('/api/keywords');
    expect(current.data).toMatchObject({ source: 'inline', count: 3, keywords: ['password', 'api_key', 'credit_card'] });

    const reloaded = await client.post('/api/keywords/reload');
    expect(reloaded.data).toEqual({ reloaded: true, changed: false, version: 1, count: 3 });
  });

  it('should reject malformed JSON bodies', async () => {
    const res = await client.post('/api/scores/batch', '{"endpointIds": [', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: string) => data],
    });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Malformed JSON body', code: 'VALIDATION_FAILED' });
  });

  it('should return JSON 404s for unknown API routes', async () => {
    const res = await client.get('/api/nothing-here');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
  });
});

describe('dashboard API keyword reload failure', () => {
  let client: AxiosInstance;
  let close: () => Promise<void>;
  let keywords: KeywordStore;

  beforeAll(async () => {
    let reads = 0;
    keywords = new KeywordStore({
      describe: () => 'remote',
      read: async () => {
        reads += 1;
        if (reads > 1) throw new Error('down');
        return 'password';
      },
    });
    await keywords.load();

    const configs = new InMemoryEndpointConfigSource([endpointConfig()]);
    const { server, io } = createDashboardServer({
      orchestrator: new ScoringOrchestrator(new ScoringEngine(), configs, new InMemoryTrafficLogSource(), keywords),
      configs,
      keywords,
      shares: new ShareStore({ directory: os.tmpdir() }),
      reports: new ReportGenerator({ openaiApiKey: '' }),
      notifications: new NotificationService(),
      publicBaseUrl: 'http://posture.test',
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    close = async () => {
      await io.close();
    };
  });

  afterAll(async () => {
    await close();
  });

  it('should answer 503 and keep the previous set when the source is unavailable', async () => {
    const res = await client.post('/api/keywords/reload');
    expect(res.status).toBe(503);
    expect(res.data).toEqual({
      error: 'Cannot read keyword source remote: down',
      code: 'KEYWORD_SET_UNAVAILABLE',
      version: 1,
    });
    expect(keywords.current().keywords).toEqual(['password']);
  });
});
