/**
 * Error taxonomy for the experiment.
 *
 * FetchFailure and PredictionFailure are contained by the runner and recorded
 * as data (skipped ticker / ERROR label). ConfigurationError and StateFileError
 * end the invocation before anything is persisted.
 */

export type ExperimentErrorCode =
  | 'FETCH_FAILURE'
  | 'PREDICTION_FAILURE'
  | 'EMPTY_DATASET'
  | 'CONFIGURATION'
  | 'STATE_FILE'
  | 'DUPLICATE_RECORD';

export class ExperimentError extends Error {
  readonly code: ExperimentErrorCode;

  constructor(code: ExperimentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExperimentError';
    this.code = code;
  }
}

export class FetchFailure extends ExperimentError {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super('FETCH_FAILURE', `${ticker}: ${message}`, options);
    this.name = 'FetchFailure';
    this.ticker = ticker;
  }
}

export class PredictionFailure extends ExperimentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PREDICTION_FAILURE', message, options);
    this.name = 'PredictionFailure';
  }
}

export class EmptyDatasetError extends ExperimentError {
  constructor(message = 'No prediction records to aggregate') {
    super('EMPTY_DATASET', message);
    this.name = 'EmptyDatasetError';
  }
}

export class ConfigurationError extends ExperimentError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class StateFileError extends ExperimentError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('STATE_FILE', `${filePath}: ${message}`, options);
    this.name = 'StateFileError';
    this.filePath = filePath;
  }
}

export class DuplicateRecordError extends ExperimentError {
  readonly date: string;
  readonly ticker: string;

  constructor(date: string, ticker: string) {
    super('DUPLICATE_RECORD', `A record for ${ticker} on ${date} already exists`);
    this.name = 'DuplicateRecordError';
    this.date = date;
    this.ticker = ticker;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
