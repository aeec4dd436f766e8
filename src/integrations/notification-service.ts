// ============================================================================
// Notification Service - Email report delivery and Slack alerts
// ============================================================================

import axios from 'axios';
import nodemailer from 'nodemailer';
import { Logger } from '../utils/logger';
import { errorMessage } from '../core/errors';
import { exportFilename, renderHtml, toJson } from '../agents/report/report-exporter';
import { DeliveryResult, NotificationConfig, ScoreReport, SecurityLevel } from '../types';

const ALERT_LEVELS: readonly SecurityLevel[] = ['Critical', 'Poor'];

interface SlackBlock {
  type: 'header' | 'section' | 'context';
  text?: { type: 'plain_text' | 'mrkdwn'; text: string };
  fields?: { type: 'mrkdwn'; text: string }[];
  elements?: { type: 'mrkdwn'; text: string }[];
}

export class NotificationService {
  private logger = new Logger('notifications');

  constructor(private readonly config: NotificationConfig = {}) {}

  get emailConfigured(): boolean {
    return this.config.email !== undefined;
  }

  /** Sends every channel that is configured; never throws. */
  async notify(report: ScoreReport): Promise<DeliveryResult[]> {
    const tasks: Promise<DeliveryResult>[] = [];

    if (this.config.slack) {
      tasks.push(this.slackAlert(report));
    }
    if (this.config.email && this.config.email.recipients.length > 0) {
      tasks.push(this.emailReport(report));
    }

    return Promise.all(tasks);
  }

  // ---------------------------------------------------------------------------
  // Slack Integration
  // ---------------------------------------------------------------------------
  async slackAlert(report: ScoreReport, webhookUrl = this.config.slack?.webhookUrl): Promise<DeliveryResult> {
    const { summary } = report.sections;

    if (!webhookUrl) {
      return { channel: 'slack', delivered: false, error: 'Slack webhook is not configured' };
    }
    if (!ALERT_LEVELS.includes(summary.level)) {
      return { channel: 'slack', delivered: false, skipped: true };
    }

    this.logger.info('Sending Slack alert', { endpoint: report.endpoint.id });

    const emoji = summary.level === 'Critical' ? ':rotating_light:' : ':warning:';
    const blocks: SlackBlock[] = [
      {
        type: 'header',
        text: { type: 'plain_text', text: `${emoji} API Security - ${report.endpoint.name}: ${summary.overallScore}/100` },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Level:* ${summary.level}` },
          { type: 'mrkdwn', text: `*Below threshold:* ${summary.componentsBelowThreshold} component(s)` },
          { type: 'mrkdwn', text: `*Error rate:* ${summary.errorRate}%` },
          { type: 'mrkdwn', text: `*Sensitive data:* ${summary.sensitiveMatchPercentage}% of requests` },
        ],
      },
    ];

    const urgent = report.sections.recommendations.filter((r) => r.severity === 'critical' || r.severity === 'high');
    if (urgent.length > 0) {
      blocks.push({
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `*:fire: ${urgent.length} Critical/High Recommendation(s):*\n${urgent.slice(0, 5).map((r) => `• [${r.severity.toUpperCase()}] ${r.title}`).join('\n')}`,
        },
      });
    }

    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `Window ${report.timeRange.start} to ${report.timeRange.end}` }],
    });

    try {
      await axios.post(webhookUrl, {
        channel: this.config.slack?.channel,
        text: `API Security: ${report.endpoint.name} scored ${summary.overallScore}/100 (${summary.level})`,
        blocks,
      });
      this.logger.info('Slack alert sent successfully');
      return { channel: 'slack', delivered: true };
    } catch (error) {
      this.logger.error('Failed to send Slack alert', { error: errorMessage(error) });
      return { channel: 'slack', delivered: false, error: errorMessage(error) };
    }
  }

  // ---------------------------------------------------------------------------
  // Email Integration
  // ---------------------------------------------------------------------------
  async emailReport(report: ScoreReport, recipients = this.config.email?.recipients ?? []): Promise<DeliveryResult> {
    const email = this.config.email;
    if (!email) {
      return { channel: 'email', delivered: false, error: 'SMTP is not configured' };
    }
    if (recipients.length === 0) {
      return { channel: 'email', delivered: false, error: 'No recipients' };
    }

    this.logger.info('Sending email report', { endpoint: report.endpoint.id, recipients: recipients.length });

    const { smtpConfig } = email;
    const transporter = nodemailer.createTransport({
      host: smtpConfig.host,
      port: smtpConfig.port,
      secure: smtpConfig.secure,
      auth: smtpConfig.auth,
    });
    const { summary } = report.sections;

    try {
      await transporter.sendMail({
        from: smtpConfig.from,
        to: recipients.join(', '),
        subject: `[${summary.level}] API Security Report - ${report.endpoint.name} - ${summary.overallScore}/100`,
        text: report.executiveSummary,
        html: renderHtml(report),
        attachments: [
          { filename: exportFilename(report, 'json'), content: toJson(report), contentType: 'application/json' },
        ],
      });
      this.logger.info('Email report sent successfully');
      return { channel: 'email', delivered: true };
    } catch (error) {
      this.logger.error('Failed to send email report', { error: errorMessage(error) });
      return { channel: 'email', delivered: false, error: errorMessage(error) };
    }
  }
}
