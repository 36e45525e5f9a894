export type ErrorCode =
  | 'EMPTY_SELECTION'
  | 'UNKNOWN_TOOL'
  | 'INVALID_WEIGHT'
  | 'INVALID_THRESHOLD'
  | 'DUPLICATE_TOOL'
  | 'TOOL_EXECUTION'
  | 'SOURCE_UNAVAILABLE'
  | 'PRICE_SOURCE_UNAVAILABLE'
  | 'LOG_WRITE'
  | 'SELECTOR'
  | 'NO_MARKETS'
  | 'CONFIG';

export class HooplineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Validation: always raised before scoring, never partially applied

export class ValidationError extends HooplineError {}

export class EmptySelectionError extends ValidationError {
  constructor() {
    super('EMPTY_SELECTION', 'Tool selection is empty');
  }
}

export class UnknownToolError extends ValidationError {
  readonly toolName: string;

  constructor(toolName: string, available: readonly string[] = []) {
    const suffix = available.length ? `. Available: ${available.join(', ')}` : '';
    super('UNKNOWN_TOOL', `Unknown tool: ${toolName}${suffix}`);
    this.toolName = toolName;
  }
}

export class InvalidWeightError extends ValidationError {
  readonly toolName: string;
  readonly weight: number;

  constructor(toolName: string, weight: number) {
    super('INVALID_WEIGHT', `Invalid weight for ${toolName}: ${weight}`);
    this.toolName = toolName;
    this.weight = weight;
  }
}

export class InvalidThresholdError extends ValidationError {
  readonly threshold: number;

  constructor(threshold: number) {
    super('INVALID_THRESHOLD', `Threshold must be within [0, 1], got ${threshold}`);
    this.threshold = threshold;
  }
}

export class DuplicateToolError extends HooplineError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('DUPLICATE_TOOL', `Tool already registered: ${toolName}`);
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends HooplineError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super('TOOL_EXECUTION', `Tool ${toolName} failed: ${errorMessage(cause)}`, { cause });
    this.toolName = toolName;
  }
}

export class SourceUnavailableError extends HooplineError {
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super('SOURCE_UNAVAILABLE', message, { cause: options.cause });
    this.status = options.status ?? null;
  }
}

export class PriceSourceUnavailableError extends HooplineError {
  readonly marketId: string;
  readonly consecutiveFailures: number;
  readonly ticksElapsed: number;

  constructor(marketId: string, consecutiveFailures: number, ticksElapsed: number, cause: unknown) {
    super(
      'PRICE_SOURCE_UNAVAILABLE',
      `Price source unavailable for ${marketId} after ${consecutiveFailures} consecutive failures: ${errorMessage(cause)}`,
      { cause }
    );
    this.marketId = marketId;
    this.consecutiveFailures = consecutiveFailures;
    this.ticksElapsed = ticksElapsed;
  }
}

export class LogWriteError extends HooplineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('LOG_WRITE', `Could not append to ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class SelectorError extends HooplineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SELECTOR', message, options);
  }
}

export class NoMarketsError extends HooplineError {
  constructor(category: string) {
    super('NO_MARKETS', `No open ${category} markets found`);
  }
}

export class ConfigError extends HooplineError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
