import { describe, it, expect, vi } from 'vitest';
import { ClaudePredictor, listModels } from '../predictor.js';
import type { QueryResult } from '../agent-sdk.js';
import { PredictionFailure } from '../errors.js';

function reply(overrides: Partial<QueryResult> = {}): QueryResult {
  return { result: ' UP\n', success: true, model: 'test-model', costUsd: 0.001, durationMs: 120, ...overrides };
}

describe('ClaudePredictor', () => {
  it('sends the prompt with model and system prompt, and trims the reply', async () => {
    const runQuery = vi.fn(async () => reply());
    const predictor = new ClaudePredictor('test-model', 5000, runQuery);

    await expect(predictor.predict('Predict TSLA', 'Answer UP or DOWN')).resolves.toBe('UP');
    expect(runQuery).toHaveBeenCalledWith('Predict TSLA', { model: 'test-model', systemPrompt: 'Answer UP or DOWN' }, 5000);
  });

  it('turns a thrown error into PredictionFailure', async () => {
    const predictor = new ClaudePredictor('test-model', 5000, async () => {
      throw new Error('aborted');
    });

    await expect(predictor.predict('p', 's')).rejects.toThrow(PredictionFailure);
    await expect(predictor.predict('p', 's')).rejects.toThrow('Model call failed: aborted');
  });

  it('turns an unsuccessful result into PredictionFailure', async () => {
    const predictor = new ClaudePredictor('test-model', 5000, async () =>
      reply({ success: false, result: 'error_max_turns' })
    );

    await expect(predictor.predict('p', 's')).rejects.toThrow('Model call did not complete: error_max_turns');
  });

  it('still answers when a different model served the request', async () => {
    const predictor = new ClaudePredictor('test-model', 5000, async () => reply({ model: 'other-model', result: 'DOWN' }));
    await expect(predictor.predict('p', 's')).resolves.toBe('DOWN');
  });
});

describe('listModels', () => {
  const models = [
    { value: 'model-a', displayName: 'Model A', description: 'first' },
    { value: 'test-model', displayName: 'Test Model', description: 'second' },
  ];

  it('marks the configured model', async () => {
    const fetchModels = vi.fn(async (_timeoutMs: number) => models);

    const listing = await listModels('test-model', 5000, fetchModels);

    expect(fetchModels).toHaveBeenCalledWith(5000);
    expect(listing).toEqual({
      configured: 'test-model',
      available: true,
      models: [
        { value: 'model-a', displayName: 'Model A', configured: false },
        { value: 'test-model', displayName: 'Test Model', configured: true },
      ],
    });
  });

  it('reports a configured model the account does not offer', async () => {
    const listing = await listModels('missing-model', 5000, async () => models);
    expect(listing.available).toBe(false);
    expect(listing.models.every((m) => !m.configured)).toBe(true);
  });

  it('wraps SDK errors in PredictionFailure', async () => {
    const pending = listModels('test-model', 5000, async () => {
      throw new Error('not logged in');
    });
    await expect(pending).rejects.toBeInstanceOf(PredictionFailure);
    await expect(pending).rejects.toThrow('Model listing failed: not logged in');
  });
});
