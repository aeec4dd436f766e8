// ============================================================================
// Score Aggregator - weighted composite and qualitative level
// ============================================================================

import { round2 } from '../../core/components';
import { ComponentScore, ComponentId, SecurityLevel } from '../../types';

// Lower bounds inclusive, evaluated top-down
export const LEVEL_BANDS: readonly { min: number; level: SecurityLevel }[] = [
  { min: 90, level: 'Excellent' },
  { min: 75, level: 'Good' },
  { min: 60, level: 'Fair' },
  { min: 40, level: 'Poor' },
];

export const LEVEL_COLORS: Record<SecurityLevel, string> = {
  Excellent: '#2e7d32',
  Good: '#558b2f',
  Fair: '#f9a825',
  Poor: '#ef6c00',
  Critical: '#c62828',
};

export function levelFor(score: number): SecurityLevel {
  return LEVEL_BANDS.find((band) => score >= band.min)?.level ?? 'Critical';
}

export function colorFor(score: number): string {
  return LEVEL_COLORS[levelFor(score)];
}

export function buildComponentScore(
  component: ComponentId,
  label: string,
  score: number,
  weight: number,
  facts: ComponentScore['facts'],
): ComponentScore {
  return {
    component,
    label,
    score,
    weight,
    weightedScore: round2(score * weight),
    level: levelFor(score),
    facts,
  };
}

/**
 * Σ(score × weight) over the components, rounded to two decimals and
 * clamped to [0, 100].
 */
export function aggregate(components: readonly ComponentScore[]): { overallScore: number; level: SecurityLevel } {
  const total = components.reduce((sum, c) => sum + c.score * c.weight, 0);
  const overallScore = Math.max(0, Math.min(100, round2(total)));
  return { overallScore, level: levelFor(overallScore) };
}
