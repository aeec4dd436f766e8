import { describe, it, expect } from 'vitest';
import { escapeHtml, exportFilename, exportReport, formatFact, isExportFormat, renderHtml, toJson } from './report-exporter';
import { ReportGenerator } from './report-generator';
import { ScoringEngine } from '../../core/scoring-engine';
import { KEYWORDS, RANGE, endpointConfig, flatDay, weakConfig, weakSample } from '../../testing/fixtures';

const engine = new ScoringEngine();
const reports = new ReportGenerator({ openaiApiKey: '' });
const generatedAt = new Date('2024-03-08T00:00:00.000Z');

describe('report exporter', () => {
  it('should escape markup', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
  });

  it('should name exports after the endpoint and window', async () => {
    const report = await reports.build(engine.score(weakConfig({ id: 'legacy/api v1' }), [], RANGE, KEYWORDS), { generatedAt });
    expect(exportFilename(report, 'json')).toBe('api-security-legacy_api_v1-2024-03-01_2024-03-07.json');
  });

  it('should export JSON that round-trips the report', async () => {
    const report = await reports.build(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS), { generatedAt });
    const exported = exportReport(report, 'json');

    expect(exported.contentType).toBe('application/json; charset=utf-8');
    expect(exported.filename).toBe('api-security-legacy-api-2024-03-01_2024-03-07.json');
    expect(exported.body).toBe(toJson(report));
    expect(JSON.parse(exported.body)).toMatchObject({
      id: 'report_legacy-api_1709856000000',
      generatedAt: '2024-03-08T00:00:00.000Z',
      sections: { summary: { overallScore: 14.75, level: 'Critical' } },
    });
  });

  it('should render an HTML report', async () => {
    const report = await reports.build(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS), { generatedAt });
    const exported = exportReport(report, 'html');
    const html = exported.body;

    expect(exported.contentType).toBe('text/html; charset=utf-8');
    expect(html).toContain('<h1 style="color: #c62828;">API Security Report - Legacy API</h1>');
    expect(html).toContain('<h2>Recommendations (8)</h2>');
    expect(html).toContain('<h3>Sensitive Keywords</h3>');
    expect(html).toContain('Keyword set v1');
  });

  it('should carry component facts, traffic and sensitive-data counts in HTML', async () => {
    const report = await reports.build(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS), { generatedAt });
    const html = renderHtml(report);

    expect(html).toContain('<li>reason: whitelist empty while traffic exists</li>');
    expect(html).toContain('<li>unmatchedSample: 198.51.100.7, 198.51.100.8</li>');
    expect(html).toContain('<strong>Configure an IP whitelist</strong> (ip_whitelist_coverage) - ');
    expect(html).toContain('<li>Errors: 1 (25%)</li>');
    expect(html).toContain('<li>Unique source IPs: 2</li>');
    expect(html).toContain('<li>Peak hours: 10 (max 4/h)</li>');
    expect(html).toContain('<li>Entries with keywords: 1 (25%)</li>');
    expect(html).toContain('<li>Header matches: 0 | Body matches: 1</li>');
    expect(html).toContain('<tr><td style="padding: 8px; border: 1px solid #ddd;">500</td><td style="padding: 8px; border: 1px solid #ddd;">1</td></tr>');
  });

  it('should list degraded reasons among component facts', async () => {
    expect(formatFact(null)).toBe('n/a');
    expect(formatFact([])).toBe('none');

    const degraded = new ScoringEngine({ errorRateCeiling: 0 }).score(weakConfig(), weakSample(), RANGE, KEYWORDS);
    const html = renderHtml(await reports.build(degraded, { generatedAt }));
    expect(html).toContain('<li style="color: #c62828;">degraded: error rate ceiling is not configured</li>');
  });

  it('should escape endpoint names in HTML', async () => {
    const result = engine.score(endpointConfig({ name: 'Orders <Admin> & Co' }), flatDay(), RANGE, KEYWORDS);
    const html = renderHtml(await reports.build(result, { generatedAt }));

    expect(html).toContain('API Security Report - Orders &lt;Admin&gt; &amp; Co');
    expect(html).toContain('<p>No recommendations. All components meet their thresholds.</p>');
    expect(html).not.toContain('<h3>Sensitive Keywords</h3>');
  });

  it('should recognise export formats', () => {
    expect(isExportFormat('html')).toBe(true);
    expect(isExportFormat('pdf')).toBe(false);
  });
});
