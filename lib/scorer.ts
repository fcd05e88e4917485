/**
 * Scoring
 *
 * Ground truth compares today's open with yesterday's close (overnight gap),
 * not open vs close. Which labels exist, and what an exact tie scores as,
 * is decided by the active LabelPolicy.
 */

import type { Direction, LabelPolicy, LabelScheme, PredictionLabel } from '../src/types/index.js';

export const DEFAULT_LABEL_POLICY: LabelPolicy = { scheme: 'binary', tieBreak: 'UP' };

export function allowedLabels(scheme: LabelScheme): Direction[] {
  return scheme === 'ternary' ? ['UP', 'DOWN', 'NEUTRAL'] : ['UP', 'DOWN'];
}

export function actualLabel(todayOpen: number, yesterdayClose: number, policy: LabelPolicy): Direction {
  if (todayOpen > yesterdayClose) return 'UP';
  if (todayOpen < yesterdayClose) return 'DOWN';
  return policy.scheme === 'ternary' ? 'NEUTRAL' : policy.tieBreak;
}

/**
 * Map free-form model output onto a label: the first word that is a label of
 * the active scheme wins. Anything else is INVALID.
 */
export function normalizePrediction(raw: string, scheme: LabelScheme): PredictionLabel {
  const allowed = allowedLabels(scheme);
  const tokens = raw.toUpperCase().match(/[A-Z]+/g) ?? [];
  for (const token of tokens) {
    const label = allowed.find((l) => l === token);
    if (label) return label;
  }
  return 'INVALID';
}

export function isCorrect(predicted: PredictionLabel, actual: Direction): boolean {
  return predicted === actual;
}

export function describePolicy(policy: LabelPolicy): string {
  if (policy.scheme === 'ternary') {
    return 'ternary labels (UP/DOWN/NEUTRAL), exact ties score as NEUTRAL';
  }
  return `binary labels (UP/DOWN), exact ties score as ${policy.tieBreak}`;
}
