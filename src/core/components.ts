// ============================================================================
// Component Table - the nine scored dimensions, their weights and thresholds
// ============================================================================
//
// Composite = Σ(component_score × weight), weights sum to 1.0
//
//   ip_whitelist_coverage     0.15   acceptable ≥ 50
//   throttling_configured     0.15   acceptable ≥ 75
//   quota_configured          0.05   acceptable ≥ 50
//   authentication_strength   0.20   acceptable ≥ 50
//   allowed_hours             0.05   acceptable ≥ 50
//   traffic_anomaly           0.05   acceptable ≥ 75
//   error_rate                0.05   acceptable ≥ 75
//   ssl_tls_status            0.10   acceptable ≥ 80
//   logging_status            0.20   acceptable ≥ 80
//
// ============================================================================

import { ConfigurationError } from './errors';
import { ComponentId } from '../types';

export interface ComponentDefinition {
  id: ComponentId;
  label: string;
  weight: number;
  threshold: number;
}

const COMPONENT_TABLE: ComponentDefinition[] = [
  { id: 'ip_whitelist_coverage', label: 'IP Whitelist Coverage', weight: 0.15, threshold: 50 },
  { id: 'throttling_configured', label: 'Throttling Configuration', weight: 0.15, threshold: 75 },
  { id: 'quota_configured', label: 'Quota Configuration', weight: 0.05, threshold: 50 },
  { id: 'authentication_strength', label: 'Authentication Strength', weight: 0.20, threshold: 50 },
  { id: 'allowed_hours', label: 'Allowed Hours', weight: 0.05, threshold: 50 },
  { id: 'traffic_anomaly', label: 'Traffic Anomaly', weight: 0.05, threshold: 75 },
  { id: 'error_rate', label: 'Error Rate', weight: 0.05, threshold: 75 },
  { id: 'ssl_tls_status', label: 'SSL/TLS Status', weight: 0.10, threshold: 80 },
  { id: 'logging_status', label: 'Logging Status', weight: 0.20, threshold: 80 },
];

export const COMPONENTS: readonly ComponentDefinition[] = Object.freeze(
  COMPONENT_TABLE.map((c) => Object.freeze(c)),
);

export const COMPONENT_IDS: readonly ComponentId[] = COMPONENTS.map((c) => c.id);

export const WEIGHT_TOLERANCE = 1e-6;

/** Builds a record keyed by every component id, in declaration order. */
export function mapComponents<T>(fn: (id: ComponentId) => T): Record<ComponentId, T> {
  return {
    ip_whitelist_coverage: fn('ip_whitelist_coverage'),
    throttling_configured: fn('throttling_configured'),
    quota_configured: fn('quota_configured'),
    authentication_strength: fn('authentication_strength'),
    allowed_hours: fn('allowed_hours'),
    traffic_anomaly: fn('traffic_anomaly'),
    error_rate: fn('error_rate'),
    ssl_tls_status: fn('ssl_tls_status'),
    logging_status: fn('logging_status'),
  };
}

export function defaultWeights(): Record<ComponentId, number> {
  return mapComponents((id) => componentDefinition(id).weight);
}

export function componentDefinition(id: ComponentId): ComponentDefinition {
  const definition = COMPONENTS.find((c) => c.id === id);
  if (!definition) {
    throw new ConfigurationError(`Unknown component: ${id}`);
  }
  return definition;
}

export function isComponentId(value: string): value is ComponentId {
  return COMPONENT_IDS.some((id) => id === value);
}

/**
 * Checks that a weight set names exactly the nine components, that each weight
 * lies in (0, 1] and that they sum to 1.0 within {@link WEIGHT_TOLERANCE}.
 * Throws {@link ConfigurationError}; callers run this once at startup.
 */
export function validateWeights(weights: Record<string, number>): Record<ComponentId, number> {
  const keys = Object.keys(weights);
  const unknown = keys.filter((k) => !isComponentId(k));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown weight component(s): ${unknown.join(', ')}`);
  }

  const validated = mapComponents((id) => {
    const weight = weights[id];
    if (weight === undefined) {
      throw new ConfigurationError(`Missing weight for component ${id}`);
    }
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight <= 0 || weight > 1) {
      throw new ConfigurationError(`Weight for ${id} must be in (0, 1], got ${weight}`);
    }
    return weight;
  });

  const sum = COMPONENT_IDS.reduce((total, id) => total + validated[id], 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`Component weights must sum to 1.0, got ${sum}`);
  }

  return validated;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(100, round2(score)));
}
