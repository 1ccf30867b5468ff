export class ChartwrightError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ChartwrightError";
    this.status = status;
  }
}

export class MalformedPathError extends ChartwrightError {
  path: string;

  constructor(message: string, path: string) {
    super(message, 400);
    this.name = "MalformedPathError";
    this.path = path;
  }
}

export class PathNotEditableError extends ChartwrightError {
  pattern: string;
  chartKind: string;

  constructor(pattern: string, chartKind: string | null) {
    const kind = chartKind ?? "generic";
    super(`Path '${pattern}' is not editable for chart type '${kind}'.`, 400);
    this.name = "PathNotEditableError";
    this.pattern = pattern;
    this.chartKind = kind;
  }
}

export class InvalidContainerError extends ChartwrightError {
  token: string | number;

  constructor(message: string, token: string | number) {
    super(message, 400);
    this.name = "InvalidContainerError";
    this.token = token;
  }
}

export class ChartNotFoundError extends ChartwrightError {
  payloadId: string;

  constructor(payloadId: string) {
    super(`No chart payload found for ID ${payloadId}.`, 404);
    this.name = "ChartNotFoundError";
    this.payloadId = payloadId;
  }
}

export class InvalidChartFormatError extends ChartwrightError {
  constructor(message = "Chart payloads must be JSON-like mappings.") {
    super(message, 422);
    this.name = "InvalidChartFormatError";
  }
}

export class PersistFailureError extends ChartwrightError {
  constructor(message = "Chart payload could not be saved.", opts?: { cause?: unknown }) {
    super(message, 500);
    this.name = "PersistFailureError";
    if (opts?.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

/** HTTP status carried by an error, 500 when it has none. */
export function errorStatus(err: unknown): number {
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}
