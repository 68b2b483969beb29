export type AnalysisErrorCode = "INVALID_LEVEL" | "UNKNOWN_ENCOUNTER_GROUP" | "DATASET_LOAD_FAILED";

export class AnalysisError extends Error {
  public readonly code: AnalysisErrorCode;

  constructor(message: string, code: AnalysisErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (options?.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidLevelError extends AnalysisError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super(`Level must be one of 1, 2, 3 (received ${String(value)})`, "INVALID_LEVEL");
    this.value = value;
  }
}

export class UnknownEncounterGroupError extends AnalysisError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super(`Unknown encounter group: ${String(value)}`, "UNKNOWN_ENCOUNTER_GROUP");
    this.value = value;
  }
}

export class DatasetLoadError extends AnalysisError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(`Failed to load dataset from ${filePath}`, "DATASET_LOAD_FAILED", { cause });
    this.filePath = filePath;
  }
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

export const httpStatusForAnalysisError = (err: AnalysisError): number => {
  switch (err.code) {
    case "INVALID_LEVEL":
    case "UNKNOWN_ENCOUNTER_GROUP":
      return 400;
    case "DATASET_LOAD_FAILED":
      return 503;
  }
};
