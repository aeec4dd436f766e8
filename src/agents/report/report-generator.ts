// ============================================================================
// Report Generator - score reports, executive summaries (AI or static),
// portfolio and compliance roll-ups
// ============================================================================

import OpenAI from 'openai';
import { Logger } from '../../utils/logger';
import { componentDefinition, round2 } from '../../core/components';
import { errorMessage } from '../../core/errors';
import {
  ComplianceCheck, ComplianceReport, ComponentId, CompositeScoreResult, PortfolioSummary,
  ReportSummarySection, ScoreReport, SecurityLevel, Severity,
} from '../../types';

const WEAKEST_LISTED = 5;

// ---- Compliance criteria ----
// authentication / whitelist / throttling component >= 50
// error rate < 5%, overall score >= 60
const COMPONENT_PASS = 50;
const ERROR_RATE_PASS = 5;
const OVERALL_PASS = 60;

function severityCounts(): Record<Severity, number> {
  return { critical: 0, high: 0, medium: 0, low: 0 };
}

function componentScore(result: CompositeScoreResult, id: ComponentId): number {
  return result.components.find((c) => c.component === id)?.score ?? 0;
}

export interface ReportGeneratorOptions {
  openaiApiKey?: string;
  model?: string;
}

export class ReportGenerator {
  private logger = new Logger('report-generator');
  private openai?: OpenAI;
  private readonly model: string;

  constructor(options: ReportGeneratorOptions = {}) {
    const apiKey = options.openaiApiKey ?? process.env.OPENAI_API_KEY;
    if (apiKey) {
      this.openai = new OpenAI({ apiKey });
    }
    this.model = options.model ?? 'gpt-4o';
  }

  // ---------------------------------------------------------------------------
  // Build Report
  // ---------------------------------------------------------------------------
  async build(
    result: CompositeScoreResult,
    options: { generatedAt?: Date; aiSummary?: boolean } = {},
  ): Promise<ScoreReport> {
    const generatedAt = options.generatedAt ?? new Date();
    const summary = this.summarize(result);
    const executiveSummary = options.aiSummary === false
      ? this.staticSummary(result)
      : await this.executiveSummary(result);

    return {
      id: `report_${result.endpointId}_${generatedAt.getTime()}`,
      generatedAt,
      endpoint: { id: result.endpointId, name: result.endpointName },
      timeRange: result.timeRange,
      executiveSummary,
      sections: {
        summary,
        components: result.components,
        recommendations: result.recommendations,
        trafficStats: result.traffic,
        sensitiveData: result.sensitiveData,
      },
      keywordSetVersion: result.keywordSetVersion,
    };
  }

  summarize(result: CompositeScoreResult): ReportSummarySection {
    const bySeverity = severityCounts();
    for (const rec of result.recommendations) bySeverity[rec.severity]++;

    return {
      overallScore: result.overallScore,
      level: result.level,
      componentsBelowThreshold: result.components
        .filter((c) => c.score < componentDefinition(c.component).threshold).length,
      recommendationsBySeverity: bySeverity,
      totalRequests: result.traffic.totalRequests,
      errorRate: result.traffic.errorRate,
      sensitiveMatchPercentage: result.sensitiveData.matchPercentage,
    };
  }

  // ---------------------------------------------------------------------------
  // Executive Summary
  // ---------------------------------------------------------------------------
  private async executiveSummary(result: CompositeScoreResult): Promise<string> {
    if (!this.openai) {
      return this.staticSummary(result);
    }

    try {
      const weakest = result.components
        .filter((c) => c.score < componentDefinition(c.component).threshold)
        .map((c) => `- ${c.label}: ${c.score}/100`)
        .join('\n');

      const prompt = `You are an API security analyst. Write a concise executive summary (max 200 words) for this endpoint posture report:

ENDPOINT: ${result.endpointName} (${result.endpointId})
WINDOW: ${result.timeRange.start} to ${result.timeRange.end}
OVERALL SCORE: ${result.overallScore}/100 (${result.level})
REQUESTS: ${result.traffic.totalRequests}, ERROR RATE: ${result.traffic.errorRate}%
ANOMALOUS HOURS: ${result.traffic.anomalousHours.join(', ') || 'none'}
SENSITIVE DATA IN LOGS: ${result.sensitiveData.matchPercentage}% of requests

COMPONENTS BELOW THRESHOLD:
${weakest || '- none'}

TOP RECOMMENDATIONS:
${result.recommendations.slice(0, 5).map((r) => `- [${r.severity.toUpperCase()}] ${r.title}`).join('\n') || '- none'}

Focus on: 1) Overall posture 2) Most urgent risks 3) First remediation steps`;

      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: 400,
        temperature: 0.3,
      });

      return response.choices[0]?.message?.content || this.staticSummary(result);
    } catch (error) {
      this.logger.warn('AI summary generation failed, using static summary', { error: errorMessage(error) });
      return this.staticSummary(result);
    }
  }

  staticSummary(result: CompositeScoreResult): string {
    const below = result.components.filter((c) => c.score < componentDefinition(c.component).threshold);
    const critical = result.recommendations.filter((r) => r.severity === 'critical').length;

    let summary = `${result.endpointName} scored ${result.overallScore}/100 (${result.level}) `;
    summary += `over ${result.traffic.totalRequests} request(s) from ${result.timeRange.start} to ${result.timeRange.end}. `;

    if (below.length === 0) {
      summary += 'All components meet their acceptable thresholds. ';
    } else {
      summary += `${below.length} component(s) below threshold: ${below.map((c) => c.label).join(', ')}. `;
      if (critical > 0) {
        summary += `${critical} critical issue(s) require immediate attention. `;
      }
      summary += `Top issue: ${result.recommendations[0]?.title ?? below[0].label}. `;
    }

    if (result.sensitiveData.matchingEntries > 0) {
      summary += `${result.sensitiveData.matchPercentage}% of logged requests contain sensitive keywords. `;
    }
    if (result.traffic.anomalousHours.length > 0) {
      summary += `${result.traffic.anomalousHours.length} anomalous traffic hour(s) detected. `;
    }

    return summary.trim();
  }

  // ---------------------------------------------------------------------------
  // Portfolio Summary
  // ---------------------------------------------------------------------------
  portfolioSummary(results: readonly CompositeScoreResult[]): PortfolioSummary {
    const endpointsByLevel: Record<SecurityLevel, number> = { Excellent: 0, Good: 0, Fair: 0, Poor: 0, Critical: 0 };
    const recommendationsBySeverity = severityCounts();
    const recommendationsByComponent: PortfolioSummary['recommendationsByComponent'] = {};

    for (const result of results) {
      endpointsByLevel[result.level]++;
      for (const rec of result.recommendations) {
        recommendationsBySeverity[rec.severity]++;
        recommendationsByComponent[rec.component] = (recommendationsByComponent[rec.component] ?? 0) + 1;
      }
    }

    const total = results.reduce((sum, r) => sum + r.overallScore, 0);

    return {
      totalEndpoints: results.length,
      averageScore: results.length > 0 ? round2(total / results.length) : 0,
      endpointsByLevel,
      recommendationsBySeverity,
      recommendationsByComponent,
      weakestEndpoints: [...results]
        .sort((a, b) => a.overallScore - b.overallScore || a.endpointId.localeCompare(b.endpointId))
        .slice(0, WEAKEST_LISTED)
        .map((r) => ({
          endpointId: r.endpointId,
          endpointName: r.endpointName,
          overallScore: r.overallScore,
          level: r.level,
        })),
    };
  }

  // ---------------------------------------------------------------------------
  // Compliance Report
  // ---------------------------------------------------------------------------
  complianceReport(results: readonly CompositeScoreResult[]): ComplianceReport {
    const check = (name: string): ComplianceCheck => ({ name, passed: 0, failed: 0, failedEndpoints: [] });
    const checks: ComplianceReport['checks'] = {
      authenticationRequired: check('Authentication Required'),
      ipWhitelistConfigured: check('IP Whitelist Configured'),
      throttlingEnabled: check('Throttling Enabled'),
      lowErrorRate: check(`Error Rate < ${ERROR_RATE_PASS}%`),
      scoreAcceptable: check(`Security Score >= ${OVERALL_PASS}`),
    };

    const record = (target: ComplianceCheck, passed: boolean, name: string) => {
      if (passed) {
        target.passed++;
      } else {
        target.failed++;
        target.failedEndpoints.push(name);
      }
    };

    for (const result of results) {
      const name = result.endpointName;
      record(checks.authenticationRequired, componentScore(result, 'authentication_strength') >= COMPONENT_PASS, name);
      record(checks.ipWhitelistConfigured, componentScore(result, 'ip_whitelist_coverage') >= COMPONENT_PASS, name);
      record(checks.throttlingEnabled, componentScore(result, 'throttling_configured') >= COMPONENT_PASS, name);
      record(checks.lowErrorRate, result.traffic.errorRate < ERROR_RATE_PASS, name);
      record(checks.scoreAcceptable, result.overallScore >= OVERALL_PASS, name);
    }

    const totalChecks = Object.keys(checks).length * results.length;
    const passed = Object.values(checks).reduce((sum, c) => sum + c.passed, 0);

    return {
      totalEndpoints: results.length,
      compliancePercentage: totalChecks > 0 ? round2((passed / totalChecks) * 100) : 0,
      checks,
      totals: { checks: totalChecks, passed, failed: totalChecks - passed },
    };
  }
}
