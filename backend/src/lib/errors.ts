// Raised by trace sources when the document itself cannot be obtained.
export class TraceLoadError extends Error {
  constructor(message: string, readonly source?: string) {
    super(message);
    this.name = "TraceLoadError";
  }
}

export class GraphFormatError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "GraphFormatError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
