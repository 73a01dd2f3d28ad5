export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised by the record store for identifier problems, SQLite errors and I/O failures.
 * The transaction that evolved the schema has already been rolled back when this is thrown.
 */
export class StoreError extends Error {
  readonly table: string | null;

  constructor(message: string, table: string | null = null, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StoreError";
    this.table = table;
  }
}

export class MissingParameterError extends Error {
  readonly task: string;
  readonly parameter: string;

  constructor(task: string, parameter: string) {
    super(`Parameter '${parameter}' is required for the '${task}' task`);
    this.name = "MissingParameterError";
    this.task = task;
    this.parameter = parameter;
  }
}

export class InvalidParameterError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "InvalidParameterError";
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
