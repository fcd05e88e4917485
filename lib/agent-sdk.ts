/**
 * Agent SDK Integration
 *
 * Thin wrapper over the Claude Agent SDK for single-turn, tool-less
 * completions: the experiment only ever needs "prompt in, text out".
 */

import { query, type ModelInfo, type Options, type SDKMessage, type Query } from '@anthropic-ai/claude-agent-sdk';
import * as os from 'os';

// Default options for all queries
const DEFAULT_OPTIONS: Partial<Options> = {
  maxTurns: 1,
  allowedTools: [],
  permissionMode: 'default',
  cwd: os.tmpdir(), // no project files in reach of the model
  settingSources: [],
};

export interface QueryResult {
  result: string;
  success: boolean;
  model: string | null;
  costUsd: number;
  durationMs: number;
}

/**
 * Execute a query using the Agent SDK
 */
export function executeQuery(prompt: string, options: Partial<Options> = {}): Query {
  return query({
    prompt,
    options: {
      ...DEFAULT_OPTIONS,
      ...options,
    },
  });
}

/**
 * Fold an SDK message stream into the final result.
 */
export async function collectResult(messages: AsyncIterable<SDKMessage>): Promise<QueryResult> {
  let result = '';
  let success = false;
  let model: string | null = null;
  let costUsd = 0;
  let durationMs = 0;

  for await (const message of messages) {
    if (message.type === 'system' && message.subtype === 'init') {
      model = message.model;
    }
    if (message.type === 'result') {
      if (message.subtype === 'success') {
        result = message.result;
        success = true;
      } else {
        success = false;
        result = message.subtype;
      }
      costUsd = message.total_cost_usd;
      durationMs = message.duration_ms;
    }
  }

  return { result, success, model, costUsd, durationMs };
}

/**
 * Execute a query and wait for the final result, aborting after `timeoutMs`.
 */
export async function executeAndWait(
  prompt: string,
  options: Partial<Options> = {},
  timeoutMs?: number
): Promise<QueryResult> {
  const abortController = new AbortController();
  const timer = timeoutMs ? setTimeout(() => abortController.abort(), timeoutMs) : null;

  try {
    return await collectResult(executeQuery(prompt, { ...options, abortController }));
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Models the SDK reports for this account. The session is aborted as soon as
 * the list arrives, before the prompt gets answered.
 */
export async function listSupportedModels(timeoutMs?: number): Promise<ModelInfo[]> {
  const abortController = new AbortController();
  const timer = timeoutMs ? setTimeout(() => abortController.abort(), timeoutMs) : null;

  try {
    return await executeQuery("Say 'test'", { abortController }).supportedModels();
  } finally {
    if (timer) clearTimeout(timer);
    abortController.abort();
  }
}

// Export types
export type { ModelInfo, Options, SDKMessage, Query };
