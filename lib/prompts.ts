/**
 * Prompt variants
 *
 * Each variant gives the model a different amount of context. Variant order
 * is significant: it fixes the "Prompt k" columns of the result table.
 */

import { allowedLabels } from './scorer.js';
import type { LabelScheme, PriceObservation } from '../src/types/index.js';

export interface PromptVariant {
  name: string;
  description: string;
  build: (observation: PriceObservation, scheme: LabelScheme) => string;
}

function formatPrices(prices: number[]): string {
  return prices.map((p) => `$${p.toFixed(2)}`).join(', ');
}

function answerRules(scheme: LabelScheme): string {
  const labels = allowedLabels(scheme);
  const choice = scheme === 'ternary'
    ? 'Choose UP, DOWN or NEUTRAL (NEUTRAL only if you expect the opening price to be unchanged).'
    : 'You MUST choose either UP or DOWN - neutral is not an option.';
  return [
    choice,
    'Respond with ONLY one of the following options:',
    ...labels,
    'Do not include explanations, numbers, probabilities, or any additional text.',
  ].join('\n');
}

export const PROMPT_VARIANTS: PromptVariant[] = [
  {
    name: 'Basic',
    description: 'Ticker only, no price data',
    build: (obs, scheme) => `For the stock ticker ${obs.ticker}, predict the direction of the stock price movement for the next trading day.

${answerRules(scheme)}`,
  },
  {
    name: 'Price Data',
    description: 'Extended closing-price history only',
    build: (obs, scheme) => `You are given historical closing prices for the stock ticker ${obs.ticker}, covering roughly the past 6 months (most recent last):
${formatPrices(obs.historicalCloses)}

Based ONLY on the trend, momentum and behaviour of this price series, predict the direction of the stock's movement for the next trading day.
Weigh the longer-term trend, not just the last few sessions.

${answerRules(scheme)}`,
  },
  {
    name: 'Research',
    description: 'Recent and extended prices plus open-ended research',
    build: (obs, scheme) => `For the stock ticker ${obs.ticker}, combine price analysis with everything you know about the company.

1. PRICE DATA
Recent closing prices (most recent last):
${formatPrices(obs.recentCloses)}

Closing prices over the past 6 months (most recent last):
${formatPrices(obs.historicalCloses)}

2. RESEARCH
Consider recent news and earnings, analyst sentiment, company fundamentals, sector and macro conditions, technical patterns, and any known upcoming catalysts.

Synthesize both into a prediction for the direction of the stock's movement for the next trading day.

${answerRules(scheme)}`,
  },
];

export function systemInstruction(scheme: LabelScheme): string {
  const labels = allowedLabels(scheme).join(' or ');
  const neutral = scheme === 'ternary' ? '' : ' Neutral is not an option.';
  return `You are a financial analyst. You must respond with ONLY ${labels}.${neutral}`;
}

export function variantLabel(variant: PromptVariant, index: number): string {
  return `Prompt ${index + 1} (${variant.name})`;
}
