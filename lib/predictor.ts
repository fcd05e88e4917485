import { executeAndWait, listSupportedModels, type ModelInfo, type QueryResult } from './agent-sdk.js';
import { PredictionFailure, errorMessage } from './errors.js';
import { logger } from '../src/utils/logger.js';

/**
 * Anything that turns a prompt into raw model text. Implementations throw
 * PredictionFailure; the runner turns that into an ERROR label.
 */
export interface Predictor {
  readonly model: string;
  predict(prompt: string, systemPrompt: string): Promise<string>;
}

export interface ModelCheck {
  requested: string;
  actual: string | null;
  matches: boolean;
}

export interface ModelListing {
  configured: string;
  available: boolean;
  models: Array<{ value: string; displayName: string; configured: boolean }>;
}

type RunQuery = (prompt: string, options: { model: string; systemPrompt: string }, timeoutMs: number) => Promise<QueryResult>;

export class ClaudePredictor implements Predictor {
  private warnedAboutModel = false;

  constructor(
    readonly model: string,
    private readonly timeoutMs: number,
    private readonly runQuery: RunQuery = executeAndWait
  ) {}

  async predict(prompt: string, systemPrompt: string): Promise<string> {
    let response: QueryResult;
    try {
      response = await this.runQuery(prompt, { model: this.model, systemPrompt }, this.timeoutMs);
    } catch (error) {
      throw new PredictionFailure(`Model call failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.success) {
      throw new PredictionFailure(`Model call did not complete: ${response.result}`);
    }

    if (response.model && response.model !== this.model && !this.warnedAboutModel) {
      logger.warn('Predictor', `Requested ${this.model}, but API used ${response.model}`);
      this.warnedAboutModel = true;
    }

    return response.result.trim();
  }
}

/**
 * Diagnostic: ask for a one-word reply and report which model served it.
 */
export async function checkModel(model: string, timeoutMs: number): Promise<ModelCheck> {
  const response = await executeAndWait("Say 'test'", { model }, timeoutMs);
  if (!response.success) {
    throw new PredictionFailure(`Model check failed: ${response.result}`);
  }
  return { requested: model, actual: response.model, matches: response.model === model };
}

/**
 * Diagnostic: the models the account can use, with the configured one marked.
 */
export async function listModels(
  configured: string,
  timeoutMs: number,
  fetchModels: (timeoutMs: number) => Promise<ModelInfo[]> = listSupportedModels
): Promise<ModelListing> {
  let models: ModelInfo[];
  try {
    models = await fetchModels(timeoutMs);
  } catch (error) {
    throw new PredictionFailure(`Model listing failed: ${errorMessage(error)}`, { cause: error });
  }

  const listed = models.map((m) => ({ value: m.value, displayName: m.displayName, configured: m.value === configured }));
  return { configured, available: listed.some((m) => m.configured), models: listed };
}
