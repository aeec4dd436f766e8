// ============================================================================
// API Posture Scorer - Core Type Definitions
// ============================================================================

export type AuthMethod = 'None' | 'ApiKey' | 'Basic' | 'OAuth' | 'JWT' | 'mTLS';
export type Severity = 'critical' | 'high' | 'medium' | 'low';
export type SecurityLevel = 'Critical' | 'Poor' | 'Fair' | 'Good' | 'Excellent';
export type KeywordMatchMode = 'substring' | 'word';
export type ExportFormat = 'json' | 'html';

export type ComponentId =
  | 'ip_whitelist_coverage'
  | 'throttling_configured'
  | 'quota_configured'
  | 'authentication_strength'
  | 'allowed_hours'
  | 'traffic_anomaly'
  | 'error_rate'
  | 'ssl_tls_status'
  | 'logging_status';

// ---------------------------------------------------------------------------
// Endpoint Configuration (config store snapshot)
// ---------------------------------------------------------------------------
export interface RateRule {
  limit: number;                   // Requests allowed per interval (<= 0 means unbounded)
  intervalSeconds: number;
}

export interface AllowedHoursWindow {
  startHour: number;               // 0-23
  endHour: number;                 // 1-24, exclusive
}

export interface EndpointConfig {
  id: string;
  name: string;
  whitelist: string[];             // Exact IPs or IPv4 CIDR blocks
  throttling?: RateRule | null;
  quota?: RateRule | null;
  authMethod: AuthMethod | string; // Unknown values are treated as None
  allowedHours?: AllowedHoursWindow | null;
  openAroundTheClockJustified?: boolean;
  clientSsl: boolean;              // Client-facing listeners are HTTPS-only
  backendSsl: boolean;             // All backend routes are HTTPS-only
  backendAddresses?: string[];
  timezone?: string;               // IANA zone for hour-of-day bucketing
  safeThrottlePerHour?: number;    // Overrides the global safe throttle threshold
}

export interface EndpointSummary {
  id: string;
  name: string;
  authMethod: string;
  updatedAt?: string;
}

// ---------------------------------------------------------------------------
// Traffic Logs (log store sample)
// ---------------------------------------------------------------------------
export interface TrafficEntry {
  timestamp: string | Date;
  statusCode: number;
  headers: Record<string, string>;
  body?: string | null;
  sourceIp?: string | null;
  scheme?: 'http' | 'https' | null;
}

export type TrafficSample = readonly TrafficEntry[];

export interface TimeRange {
  start: Date;
  end: Date;
}

// ---------------------------------------------------------------------------
// Scoring Settings (tunables)
// ---------------------------------------------------------------------------
export interface ScoringSettings {
  anomalyK: number;                     // Std-dev multiplier for hourly outliers
  anomalyPenaltyPerHour: number;        // Points removed per anomalous hour bucket
  errorRateCeiling: number;             // Error rate (%) at which the score reaches 0
  errorStatusFloor: number;             // Lowest status code counted as an error
  safeThrottlePerHour: number;          // Throttle rates above this are permissive
  keywordMatchMode: KeywordMatchMode;
  weights: Record<ComponentId, number>;
}

// ---------------------------------------------------------------------------
// Normalized Facts
// ---------------------------------------------------------------------------
export interface EndpointFacts {
  endpointId: string;
  endpointName: string;
  timezone: string;
  whitelistEntryCount: number;
  observedSourceIps: number;
  unmatchedSourceIps: string[];
  whitelistCoverage: number;            // 0-1
  throttleConfigured: boolean;
  throttlePerHour: number | null;       // null when unbounded, malformed or absent
  throttleRuleValid: boolean;           // false for a non-finite limit or a non-positive interval
  safeThrottlePerHour: number;
  quotaConfigured: boolean;
  authMethod: AuthMethod;
  declaredAuthMethod: string;
  allowedHoursRestricted: boolean;
  allowedHoursWindow: AllowedHoursWindow | null;
  openAroundTheClockJustified: boolean;
  clientSsl: boolean;
  backendSsl: boolean;
  clientHttpsRatio: number | null;      // null when no entry carried a scheme
  backendHttpsRatio: number | null;     // null when no backend address is known
  nonHttpsBackends: string[];
  totalRequests: number;
  errorCount: number;
}

// ---------------------------------------------------------------------------
// Analyzer Outputs
// ---------------------------------------------------------------------------
export interface KeywordOccurrence {
  keyword: string;
  occurrences: number;
  inHeaders: number;
  inBody: number;
}

export interface SensitiveDataFinding {
  totalEntries: number;
  matchingEntries: number;
  matchPercentage: number;              // 0-100, two decimals
  headerMatchEntries: number;
  bodyMatchEntries: number;
  keywords: KeywordOccurrence[];
  noData: boolean;
}

export interface TrafficStats {
  totalRequests: number;
  hourlyBuckets: number[];              // 24 buckets, hour-of-day
  errorCount: number;
  errorRate: number;                    // 0-100, two decimals
  anomalousHours: number[];
  mean: number;
  stdDev: number;
  threshold: number;
  peakHours: number[];
  maxHourlyRequests: number;
  uniqueSourceIps: number;
  statusCodes: Record<string, number>;
  droppedEntries: number;
  timezone: string;
}

// ---------------------------------------------------------------------------
// Scores & Recommendations
// ---------------------------------------------------------------------------
export type FactValue = string | number | boolean | null | string[] | number[];

export interface ComponentFacts {
  [key: string]: FactValue | undefined;
  degraded?: string[];
}

export interface ComponentScore {
  component: ComponentId;
  label: string;
  score: number;                        // 0-100
  weight: number;                       // (0, 1]
  weightedScore: number;
  level: SecurityLevel;
  facts: ComponentFacts;
}

export interface Recommendation {
  severity: Severity;
  title: string;
  description: string;
  action: string;
  component: ComponentId;
}

export interface CompositeScoreResult {
  endpointId: string;
  endpointName: string;
  timeRange: { start: string; end: string };
  overallScore: number;
  level: SecurityLevel;
  components: ComponentScore[];
  traffic: TrafficStats;
  sensitiveData: SensitiveDataFinding;
  recommendations: Recommendation[];
  keywordSetVersion: number;
}

// ---------------------------------------------------------------------------
// Keyword Set
// ---------------------------------------------------------------------------
export interface KeywordSnapshot {
  version: number;
  keywords: readonly string[];
  source: string;
  loadedAt: Date;
}

// ---------------------------------------------------------------------------
// Report Types
// ---------------------------------------------------------------------------
export interface ScoreReport {
  id: string;
  generatedAt: Date;
  endpoint: { id: string; name: string };
  timeRange: { start: string; end: string };
  executiveSummary: string;
  sections: {
    summary: ReportSummarySection;
    components: ComponentScore[];
    recommendations: Recommendation[];
    trafficStats: TrafficStats;
    sensitiveData: SensitiveDataFinding;
  };
  keywordSetVersion: number;
}

export interface ReportSummarySection {
  overallScore: number;
  level: SecurityLevel;
  componentsBelowThreshold: number;
  recommendationsBySeverity: Record<Severity, number>;
  totalRequests: number;
  errorRate: number;
  sensitiveMatchPercentage: number;
}

export interface PortfolioSummary {
  totalEndpoints: number;
  averageScore: number;
  endpointsByLevel: Record<SecurityLevel, number>;
  recommendationsBySeverity: Record<Severity, number>;
  recommendationsByComponent: Partial<Record<ComponentId, number>>;
  weakestEndpoints: { endpointId: string; endpointName: string; overallScore: number; level: SecurityLevel }[];
}

export interface ComplianceCheck {
  name: string;
  passed: number;
  failed: number;
  failedEndpoints: string[];
}

export interface ComplianceReport {
  totalEndpoints: number;
  compliancePercentage: number;
  checks: Record<'authenticationRequired' | 'ipWhitelistConfigured' | 'throttlingEnabled' | 'lowErrorRate' | 'scoreAcceptable', ComplianceCheck>;
  totals: { checks: number; passed: number; failed: number };
}

// ---------------------------------------------------------------------------
// Share Links
// ---------------------------------------------------------------------------
export interface SharedSnapshot {
  token: string;
  endpointId: string;
  createdAt: string;
  expiresAt: string;
  result: CompositeScoreResult;
}

// ---------------------------------------------------------------------------
// Notification Types
// ---------------------------------------------------------------------------
export interface SMTPConfig {
  host: string;
  port: number;
  secure: boolean;
  auth: { user: string; pass: string };
  from: string;
}

export interface NotificationConfig {
  email?: { recipients: string[]; smtpConfig: SMTPConfig };
  slack?: { webhookUrl: string; channel?: string };
}

export interface DeliveryResult {
  channel: 'email' | 'slack';
  delivered: boolean;
  skipped?: boolean;
  error?: string;
}
