// ============================================================================
// Report Exporter - JSON and HTML renderings of a ScoreReport
// ============================================================================

import { LEVEL_COLORS, colorFor } from '../scoring/score-aggregator';
import { ComponentFacts, ExportFormat, FactValue, ScoreReport, Severity } from '../../types';

export const SEVERITY_COLORS: Record<Severity, string> = {
  critical: '#c62828',
  high: '#e65100',
  medium: '#f9a825',
  low: '#558b2f',
};

export interface ExportedReport {
  filename: string;
  contentType: string;
  body: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function toJson(report: ScoreReport): string {
  return JSON.stringify(report, null, 2);
}

const cell = (content: string, extra = '') =>
  `<td style="padding: 8px; border: 1px solid #ddd;${extra}">${content}</td>`;

const head = (labels: string[]) =>
  `<tr style="background: #f5f5f5;">${labels.map((l) => `<th style="padding: 8px; text-align: left; border: 1px solid #ddd;">${l}</th>`).join('')}</tr>`;

export function formatFact(value: FactValue): string {
  if (value === null) return 'n/a';
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : 'none';
  return String(value);
}

function factList(facts: ComponentFacts): string {
  const items: string[] = [];
  for (const [key, value] of Object.entries(facts)) {
    if (key === 'degraded' || value === undefined) continue;
    items.push(`<li>${escapeHtml(key)}: ${escapeHtml(formatFact(value))}</li>`);
  }
  for (const reason of facts.degraded ?? []) {
    items.push(`<li style="color: #c62828;">degraded: ${escapeHtml(reason)}</li>`);
  }
  return items.length > 0 ? `<ul style="margin: 0; padding-left: 16px;">${items.join('')}</ul>` : '';
}

export function renderHtml(report: ScoreReport): string {
  const { summary, components, recommendations, trafficStats, sensitiveData } = report.sections;
  const title = `API Security Report - ${escapeHtml(report.endpoint.name)}`;

  const componentRows = components.map((c) => `
        <tr>
          ${cell(escapeHtml(c.label))}
          ${cell(String(c.score), ` color: ${colorFor(c.score)}; font-weight: bold;`)}
          ${cell(`${Math.round(c.weight * 100)}%`)}
          ${cell(String(c.weightedScore))}
          ${cell(c.level)}
          ${cell(factList(c.facts), ' font-size: 12px;')}
        </tr>`).join('');

  const recommendationItems = recommendations.map((r) => `
        <li>
          <span style="color: ${SEVERITY_COLORS[r.severity]}; font-weight: bold;">[${r.severity.toUpperCase()}]</span>
          <strong>${escapeHtml(r.title)}</strong> (${r.component}) - ${escapeHtml(r.description)}<br />
          <em>${escapeHtml(r.action)}</em>
        </li>`).join('');

  const hourRows = trafficStats.hourlyBuckets.map((count, hour) => {
    const flagged = trafficStats.anomalousHours.includes(hour);
    return `<tr>${cell(`${String(hour).padStart(2, '0')}:00`)}${cell(String(count), flagged ? ' color: #c62828; font-weight: bold;' : '')}</tr>`;
  }).join('');

  const statusRows = Object.entries(trafficStats.statusCodes)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, count]) => `<tr>${cell(escapeHtml(code))}${cell(String(count))}</tr>`).join('');

  const keywordRows = sensitiveData.keywords.map((k) =>
    `<tr>${cell(escapeHtml(k.keyword))}${cell(String(k.occurrences))}${cell(String(k.inHeaders))}${cell(String(k.inBody))}</tr>`).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>${title}</title>
</head>
<body>
  <div style="font-family: Arial, sans-serif; max-width: 900px; margin: 0 auto;">
    <h1 style="color: ${LEVEL_COLORS[summary.level]};">${title}</h1>
    <p>Endpoint ID: ${escapeHtml(report.endpoint.id)} | Window: ${report.timeRange.start} to ${report.timeRange.end}</p>

    <h2>Summary</h2>
    <div style="font-size: 36px; font-weight: bold; color: ${LEVEL_COLORS[summary.level]};">${summary.overallScore}/100 ${summary.level}</div>
    <p>${escapeHtml(report.executiveSummary)}</p>
    <ul>
      <li>Components below threshold: ${summary.componentsBelowThreshold}</li>
      <li>Requests analysed: ${summary.totalRequests}</li>
      <li>Error rate: ${summary.errorRate}%</li>
      <li>Requests with sensitive keywords: ${summary.sensitiveMatchPercentage}%</li>
    </ul>

    <h2>Security Components</h2>
    <table style="width: 100%; border-collapse: collapse;">
      ${head(['Component', 'Score', 'Weight', 'Weighted', 'Level', 'Details'])}${componentRows}
    </table>

    <h2>Recommendations (${recommendations.length})</h2>
    ${recommendations.length > 0 ? `<ol>${recommendationItems}</ol>` : '<p>No recommendations. All components meet their thresholds.</p>'}

    <h2>Traffic Statistics</h2>
    <p>Timezone: ${escapeHtml(trafficStats.timezone)} | Mean ${trafficStats.mean}/h | Std dev ${trafficStats.stdDev} | Anomaly threshold ${trafficStats.threshold} | Dropped entries ${trafficStats.droppedEntries}</p>
    <ul>
      <li>Total requests: ${trafficStats.totalRequests}</li>
      <li>Errors: ${trafficStats.errorCount} (${trafficStats.errorRate}%)</li>
      <li>Unique source IPs: ${trafficStats.uniqueSourceIps}</li>
      <li>Peak hours: ${formatFact(trafficStats.peakHours)} (max ${trafficStats.maxHourlyRequests}/h)</li>
      <li>Anomalous hours: ${formatFact(trafficStats.anomalousHours)}</li>
    </ul>
    <table style="border-collapse: collapse;">
      ${head(['Hour', 'Requests'])}${hourRows}
    </table>
    ${statusRows ? `
    <h3>Status Codes</h3>
    <table style="border-collapse: collapse;">
      ${head(['Status', 'Requests'])}${statusRows}
    </table>` : ''}

    <h2>Sensitive Data</h2>
    <ul>
      <li>Entries scanned: ${sensitiveData.totalEntries}</li>
      <li>Entries with keywords: ${sensitiveData.matchingEntries} (${sensitiveData.matchPercentage}%)</li>
      <li>Header matches: ${sensitiveData.headerMatchEntries} | Body matches: ${sensitiveData.bodyMatchEntries}</li>
    </ul>
    ${keywordRows ? `
    <h3>Sensitive Keywords</h3>
    <table style="border-collapse: collapse;">
      ${head(['Keyword', 'Requests', 'In headers', 'In body'])}${keywordRows}
    </table>` : ''}

    <hr style="margin: 30px 0;" />
    <p style="color: #666; font-size: 12px;">
      Generated: ${report.generatedAt.toISOString()} | Report ID: ${escapeHtml(report.id)} | Keyword set v${report.keywordSetVersion}
    </p>
  </div>
</body>
</html>
`;
}

export function exportFilename(report: ScoreReport, format: ExportFormat): string {
  const id = report.endpoint.id.replace(/[^A-Za-z0-9_-]+/g, '_');
  return `api-security-${id}-${report.timeRange.start.slice(0, 10)}_${report.timeRange.end.slice(0, 10)}.${format}`;
}

export function exportReport(report: ScoreReport, format: ExportFormat): ExportedReport {
  return format === 'html'
    ? { filename: exportFilename(report, 'html'), contentType: 'text/html; charset=utf-8', body: renderHtml(report) }
    : { filename: exportFilename(report, 'json'), contentType: 'application/json; charset=utf-8', body: toJson(report) };
}

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'json' || value === 'html';
}
