/**
 * A raw date value that is not a YYYY-MM-DD calendar date.
 */
export class DateParseError extends Error {
  readonly value: string;
  readonly table: string;

  constructor(value: string, table: string) {
    super(`failed to parse date '${value}' from ${table}`);
    this.name = "DateParseError";
    this.value = value;
    this.table = table;
  }
}

export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`failed to ${operation}`, { cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

export type AggregationStage = "crates" | "github";

const STAGE_LABELS: Record<AggregationStage, string> = {
  crates: "crates.io",
  github: "GitHub",
};

export class AggregationError extends Error {
  readonly stage: AggregationStage;

  constructor(stage: AggregationStage, cause: unknown) {
    super(`failed to compute ${STAGE_LABELS[stage]} weekly aggregates`, {
      cause,
    });
    this.name = "AggregationError";
    this.stage = stage;
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message} at ${path}`, { cause });
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * Renders an error and its cause chain as "outer: inner: innermost".
 */
export function formatErrorChain(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && current !== null && parts.length < 10) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(": ");
}
