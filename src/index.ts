export * from './types';
export * from './core/errors';
export * from './core/components';
export { ScoringEngine, defaultScoringSettings } from './core/scoring-engine';
export { createRuntime, prepareStores } from './core/runtime';
export type { Runtime } from './core/runtime';
export { loadAppConfig } from './config';
export type { AppConfig } from './config';
export { extractFacts } from './agents/facts/fact-extractor';
export { scanSensitiveData } from './agents/sensitive-data/sensitive-data-scanner';
export { analyzeTraffic } from './agents/traffic/traffic-analyzer';
export { SCORERS } from './agents/scoring/component-scorers';
export { aggregate, levelFor } from './agents/scoring/score-aggregator';
export { generateRecommendations, severityFor } from './agents/report/recommendation-generator';
export { ReportGenerator } from './agents/report/report-generator';
export { exportReport, renderHtml, toJson } from './agents/report/report-exporter';
export { NotificationService } from './integrations/notification-service';
export { ScoringOrchestrator } from './orchestrator';
export type { BatchItem } from './orchestrator';
export { KeywordStore, FileKeywordSource, UrlKeywordSource, keywordSourceFor, staticSnapshot } from './store/keyword-store';
export { ShareStore } from './store/share-store';
export * from './store/sources';
export { PostgresEndpointConfigSource, PostgresTrafficLogSource, initializeSchema } from './store/postgres-sources';
export { parseEndpointConfig, parseTrafficSample } from './types/schemas';
export { createDashboardServer } from './dashboard/server';
