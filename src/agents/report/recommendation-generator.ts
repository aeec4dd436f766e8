// ============================================================================
// Recommendation Generator - one severity-tagged remediation item per
// component scoring below its acceptable threshold
// ============================================================================

import { COMPONENTS, componentDefinition } from '../../core/components';
import {
  ComponentId, ComponentScore, EndpointFacts, Recommendation,
  SensitiveDataFinding, Severity, TrafficStats,
} from '../../types';

export interface RecommendationContext {
  facts: EndpointFacts;
  traffic: TrafficStats;
  sensitiveData: SensitiveDataFinding;
}

type Advice = Pick<Recommendation, 'title' | 'description' | 'action'>;

export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

const THROTTLE_HEADROOM = 1.2;
const MAX_LISTED = 5;

/**
 * Severity from how far the score falls below the threshold:
 * under 25% of it is critical, under 50% high, under 75% medium, else low.
 * Returns null when the score is acceptable.
 */
export function severityFor(score: number, threshold: number): Severity | null {
  if (score >= threshold) return null;
  const ratio = threshold > 0 ? score / threshold : 0;
  if (ratio < 0.25) return 'critical';
  if (ratio < 0.5) return 'high';
  if (ratio < 0.75) return 'medium';
  return 'low';
}

const hh = (hour: number) => `${String(hour).padStart(2, '0')}:00`;

function listed(values: readonly string[]): string {
  const head = values.slice(0, MAX_LISTED).join(', ');
  return values.length > MAX_LISTED ? `${head} and ${values.length - MAX_LISTED} more` : head;
}

// ---------------------------------------------------------------------------
// Advice per component
// ---------------------------------------------------------------------------
const ADVICE: Record<ComponentId, (c: ComponentScore, ctx: RecommendationContext) => Advice> = {
  ip_whitelist_coverage: (_c, { facts }) => {
    if (facts.whitelistEntryCount === 0) {
      return {
        title: 'Configure an IP whitelist',
        description: facts.observedSourceIps > 0
          ? `No IP whitelist is configured while ${facts.observedSourceIps} source IP(s) reached the endpoint.`
          : 'No IP whitelist is configured.',
        action: 'Restrict access to known client addresses with an IP whitelist policy.',
      };
    }
    return {
      title: 'Extend IP whitelist coverage',
      description: `${facts.unmatchedSourceIps.length} of ${facts.observedSourceIps} observed source IP(s) are not covered by the whitelist: ${listed(facts.unmatchedSourceIps)}.`,
      action: 'Review the unmatched addresses; whitelist legitimate clients and block the rest.',
    };
  },

  throttling_configured: (_c, { facts, traffic }) => {
    const suggested = Math.ceil(traffic.maxHourlyRequests * THROTTLE_HEADROOM);
    if (!facts.throttleConfigured) {
      return {
        title: 'Add a throttling policy',
        description: traffic.maxHourlyRequests > 0
          ? `No throttling rule is configured; the busiest hour of day received ${traffic.maxHourlyRequests} requests.`
          : 'No throttling rule is configured.',
        action: suggested > 0
          ? `Add a throttling policy with a limit near ${suggested} requests/hour.`
          : 'Add a throttling policy sized to expected client demand.',
      };
    }
    if (!facts.throttleRuleValid) {
      return {
        title: 'Fix the throttling rule',
        description: 'The throttling rule has a missing or invalid limit or interval and cannot be enforced as configured.',
        action: 'Set a finite limit and a positive interval on the throttling policy.',
      };
    }
    const rate = facts.throttlePerHour === null ? 'unlimited' : String(Math.round(facts.throttlePerHour));
    return {
      title: 'Tighten the throttling limit',
      description: `The throttle allows ${rate} requests/hour, above the safe threshold of ${facts.safeThrottlePerHour}.`,
      action: `Lower the throttle to at most ${facts.safeThrottlePerHour} requests/hour.`,
    };
  },

  quota_configured: () => ({
    title: 'Add a quota policy',
    description: 'No quota limits are configured for this endpoint.',
    action: 'Add a quota policy for cost control and fair usage.',
  }),

  authentication_strength: (_c, { facts }) => (facts.authMethod === 'None'
    ? {
        title: 'Require authentication',
        description: 'The endpoint accepts unauthenticated requests.',
        action: 'Add OAuth2, JWT or mTLS authentication.',
      }
    : {
        title: 'Strengthen authentication',
        description: `The endpoint relies on ${facts.authMethod} authentication.`,
        action: 'Upgrade to OAuth2, JWT or mTLS authentication.',
      }),

  allowed_hours: (_c, { traffic }) => {
    const peaks = traffic.peakHours;
    if (peaks.length === 0) {
      return {
        title: 'Restrict allowed hours',
        description: 'The endpoint is open around the clock without a recorded justification.',
        action: 'Add an allowed-hours window or record why 24/7 access is required.',
      };
    }
    return {
      title: 'Restrict allowed hours',
      description: `Traffic peaks at ${peaks.map(hh).join(', ')} but the endpoint is open around the clock.`,
      action: `Restrict access to ${hh(Math.min(...peaks))}-${hh(Math.max(...peaks) + 1)} or record why 24/7 access is required.`,
    };
  },

  traffic_anomaly: (_c, { traffic }) => ({
    title: 'Investigate traffic spikes',
    description: `${traffic.anomalousHours.length} hour bucket(s) exceeded the anomaly threshold of ${traffic.threshold} requests: ${traffic.anomalousHours.map(hh).join(', ')}.`,
    action: 'Review the traffic in these hours and confirm throttling covers the bursts.',
  }),

  error_rate: (_c, { traffic }) => ({
    title: 'Reduce the error rate',
    description: `${traffic.errorRate}% of ${traffic.totalRequests} requests returned an error status.`,
    action: 'Investigate backend health and the most frequent failing requests.',
  }),

  ssl_tls_status: (c, { facts }) => {
    const parts: string[] = [];
    if (!facts.clientSsl) parts.push(`Client traffic is ${c.facts.clientScore ?? 0}% HTTPS.`);
    if (!facts.backendSsl) {
      parts.push(facts.nonHttpsBackends.length > 0
        ? `Backend connections without TLS: ${listed(facts.nonHttpsBackends)}.`
        : 'Backend connections are not HTTPS-only.');
    }
    return {
      title: 'Enforce HTTPS',
      description: parts.join(' '),
      action: 'Serve client listeners over HTTPS only and use https:// backend addresses.',
    };
  },

  logging_status: (_c, { sensitiveData }) => {
    const keywords = sensitiveData.keywords.map((k) => `${k.keyword} (${k.occurrences})`);
    return {
      title: 'Mask sensitive data in logs',
      description: `${sensitiveData.matchPercentage}% of ${sensitiveData.totalEntries} logged requests contain sensitive keywords: ${listed(keywords)}.`,
      action: 'Configure log masking or filtering so sensitive fields are not written to traffic logs.',
    };
  },
};

/**
 * Ordered by severity (critical first), ties by component declaration order.
 */
export function generateRecommendations(
  components: readonly ComponentScore[],
  context: RecommendationContext,
): Recommendation[] {
  const recommendations: { rec: Recommendation; position: number }[] = [];

  for (const component of components) {
    const { threshold } = componentDefinition(component.component);
    const severity = severityFor(component.score, threshold);
    if (!severity) continue;

    recommendations.push({
      rec: { severity, component: component.component, ...ADVICE[component.component](component, context) },
      position: COMPONENTS.findIndex((c) => c.id === component.component),
    });
  }

  return recommendations
    .sort((a, b) =>
      SEVERITY_ORDER.indexOf(a.rec.severity) - SEVERITY_ORDER.indexOf(b.rec.severity) || a.position - b.position)
    .map((r) => r.rec);
}
