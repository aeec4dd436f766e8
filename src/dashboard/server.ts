// ============================================================================
// Dashboard API Server - scoring, exports, share links, batch scoring
// ============================================================================

import 'dotenv/config';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import http from 'http';
import { Server } from 'socket.io';
import { v4 as uuid } from 'uuid';
import { Logger } from '../utils/logger';
import { loadAppConfig } from '../config';
import { MissingDataError, ValidationError, errorMessage, isPostureError } from '../core/errors';
import { createRuntime, prepareStores } from '../core/runtime';
import { BatchRequestSchema, RangeQuerySchema, ShareRequestSchema, parseWith } from '../types/schemas';
import { ScoringOrchestrator, BatchItem } from '../orchestrator';
import { KeywordStore } from '../store/keyword-store';
import { ShareStore } from '../store/share-store';
import { EndpointConfigSource } from '../store/sources';
import { ReportGenerator } from '../agents/report/report-generator';
import { exportReport, isExportFormat } from '../agents/report/report-exporter';
import { NotificationService } from '../integrations/notification-service';
import { scheduleKeywordReload } from '../scheduler/cron';
import { CompositeScoreResult } from '../types';

const logger = new Logger('dashboard');

export interface DashboardDeps {
  orchestrator: ScoringOrchestrator;
  configs: EndpointConfigSource;
  keywords: KeywordStore;
  shares: ShareStore;
  reports: ReportGenerator;
  notifications: NotificationService;
  publicBaseUrl: string;
  corsOrigin?: string;
}

// Express 4 does not forward rejected promises; route them to the error handler
const route = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

function batchSummary(item: BatchItem) {
  return item.status === 'scored'
    ? { endpointId: item.endpointId, status: item.status, overallScore: item.result.overallScore, level: item.result.level }
    : { endpointId: item.endpointId, status: item.status, error: item.error };
}

export function createDashboardServer(deps: DashboardDeps): { app: express.Express; server: http.Server; io: Server } {
  const { orchestrator, configs, keywords, shares, reports, notifications } = deps;

  const app = express();
  const server = http.createServer(app);
  const io = new Server(server, { cors: { origin: deps.corsOrigin || '*' } });

  app.use(helmet());
  app.use(cors({
    origin: deps.corsOrigin || '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));
  app.use(express.json({ limit: '1mb' }));

  const scoreFromQuery = async (req: Request): Promise<CompositeScoreResult> => {
    const query = parseWith(RangeQuerySchema, req.query, 'query');
    const range = orchestrator.createTimeRange(query.start_date, query.end_date);
    return orchestrator.scoreEndpoint(req.params.id, range);
  };

  const scoreBatch = async (req: Request, batchId?: string): Promise<BatchItem[]> => {
    const body = parseWith(BatchRequestSchema, req.body, 'request body');
    const range = orchestrator.createTimeRange(body.start_date, body.end_date);
    return orchestrator.scoreMany(body.endpointIds, range, {
      onProgress: batchId
        ? ({ completed, total, item }) => io.emit('score:progress', { batchId, completed, total, ...batchSummary(item) })
        : undefined,
    });
  };

  // ============================= HEALTH =====================================
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      keywordSetVersion: keywords.isLoaded() ? keywords.current().version : null,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================= ENDPOINTS ==================================
  app.get('/api/endpoints', route(async (_req, res) => {
    res.json(await configs.list());
  }));

  app.get('/api/endpoints/:id/score', route(async (req, res) => {
    res.json(await scoreFromQuery(req));
  }));

  app.get('/api/endpoints/:id/export/:format', route(async (req, res) => {
    const { format } = req.params;
    if (!isExportFormat(format)) {
      throw new ValidationError(`Unsupported export format: ${format} (expected json or html)`);
    }
    const result = await scoreFromQuery(req);
    const exported = exportReport(await reports.build(result), format);

    res.setHeader('Content-Disposition', `attachment; filename="${exported.filename}"`);
    res.type(exported.contentType).send(exported.body);
  }));

  // ============================= SHARE LINKS ================================
  app.post('/api/endpoints/:id/share', route(async (req, res) => {
    const body = parseWith(ShareRequestSchema, req.body ?? {}, 'request body');
    const range = orchestrator.createTimeRange(body.start_date, body.end_date);
    const result = await orchestrator.scoreEndpoint(req.params.id, range);
    const snapshot = await shares.save(result);
    const shareUrl = `${deps.publicBaseUrl}/api/shared/${snapshot.token}`;

    let emailSent = false;
    if (body.email) {
      const delivery = await notifications.emailReport(await reports.build(result), [body.email]);
      emailSent = delivery.delivered;
    }

    res.status(201).json({ token: snapshot.token, shareUrl, expiresAt: snapshot.expiresAt, emailSent });
  }));

  app.get('/api/shared/:token', route(async (req, res) => {
    const snapshot = await shares.get(req.params.token);
    if (!snapshot) {
      throw new MissingDataError('Shared report not found or expired');
    }
    res.json(snapshot);
  }));

  // ============================= BATCH ======================================
  app.post('/api/scores/batch', route(async (req, res) => {
    const batchId = `batch_${uuid()}`;
    const items = await scoreBatch(req, batchId);
    const scored = items.filter((i) => i.status === 'scored').length;

    io.emit('score:complete', { batchId, total: items.length, scored, failed: items.length - scored });
    logger.info(`Batch ${batchId} completed (${scored}/${items.length})`);

    res.json({ batchId, total: items.length, scored, failed: items.length - scored, items: items.map(batchSummary) });
  }));

  // ============================= ROLL-UPS ===================================
  app.post('/api/reports/portfolio', route(async (req, res) => {
    const items = await scoreBatch(req);
    const results = items.flatMap((i) => (i.status === 'scored' ? [i.result] : []));
    res.json({
      summary: reports.portfolioSummary(results),
      failed: items.filter((i) => i.status === 'failed').map(batchSummary),
    });
  }));

  app.post('/api/reports/compliance', route(async (req, res) => {
    const items = await scoreBatch(req);
    const results = items.flatMap((i) => (i.status === 'scored' ? [i.result] : []));
    res.json({
      report: reports.complianceReport(results),
      failed: items.filter((i) => i.status === 'failed').map(batchSummary),
    });
  }));

  // ============================= KEYWORDS ===================================
  app.get('/api/keywords', (_req, res, next) => {
    try {
      const snapshot = keywords.current();
      res.json({
        version: snapshot.version,
        source: snapshot.source,
        loadedAt: snapshot.loadedAt.toISOString(),
        count: snapshot.keywords.length,
        keywords: snapshot.keywords,
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/keywords/reload', route(async (_req, res) => {
    const outcome = await keywords.reload();
    if (!outcome.reloaded) {
      res.status(503).json({
        error: outcome.error ?? 'Keyword reload failed',
        code: 'KEYWORD_SET_UNAVAILABLE',
        version: outcome.snapshot.version,
      });
      return;
    }
    res.json({
      reloaded: true,
      changed: outcome.changed,
      version: outcome.snapshot.version,
      count: outcome.snapshot.keywords.length,
    });
  }));

  // ============================= ERRORS =====================================
  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isPostureError(error)) {
      if (error.status >= 500) {
        logger.error(`${req.method} ${req.path} failed`, { code: error.code, error: error.message });
      }
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_FAILED' });
      return;
    }
    logger.error(`${req.method} ${req.path} failed`, { error: errorMessage(error) });
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  // ============================= WEBSOCKET ==================================
  io.on('connection', (socket) => {
    logger.info(`Dashboard client connected: ${socket.id}`);
    socket.on('disconnect', () => {
      logger.info(`Dashboard client disconnected: ${socket.id}`);
    });
  });

  return { app, server, io };
}

// ============================= START SERVER =================================
async function start(): Promise<void> {
  // Invalid weights and an unreadable keyword set are fatal here
  const config = loadAppConfig();
  const runtime = createRuntime(config);
  await runtime.keywords.load();
  await prepareStores(runtime);

  const { server } = createDashboardServer({
    ...runtime,
    publicBaseUrl: config.publicBaseUrl,
    corsOrigin: config.corsOrigin,
  });
  scheduleKeywordReload(runtime.keywords, config.keywordReloadCron);

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { error: errorMessage(reason) });
  });

  server.listen(config.port, config.host, () => {
    logger.info(`Dashboard API running on http://${config.host}:${config.port}`);
  });
}

if (require.main === module) {
  start().catch((err) => {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  });
}
