export type AnnotationErrorCode =
  | "TASK_STORE"
  | "EMPTY_DATASET"
  | "ROW_INDEX"
  | "INVALID_TOKEN"
  | "CANDIDATE_FREQUENCY"
  | "PROGRESS_PERSIST";

export class AnnotationError extends Error {
  readonly code: AnnotationErrorCode;

  constructor(code: AnnotationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The source dataset is missing, unreadable, or lacks a required column. */
export class TaskStoreError extends AnnotationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TASK_STORE", message, options);
  }
}

export class EmptyDatasetError extends AnnotationError {
  constructor(filePath: string) {
    super("EMPTY_DATASET", `Progress file has no rows to annotate: ${filePath}`);
  }
}

export class RowIndexError extends AnnotationError {
  readonly index: number;
  readonly rowCount: number;

  constructor(index: number, rowCount: number) {
    super("ROW_INDEX", `Row index ${index} is out of range [0, ${rowCount}).`);
    this.index = index;
    this.rowCount = rowCount;
  }
}

/** Tokens are stored space-joined, so a token may not contain whitespace. */
export class InvalidTokenError extends AnnotationError {
  readonly token: string;

  constructor(token: string) {
    super("INVALID_TOKEN", `Token "${token}" must be non-empty and contain no whitespace.`);
    this.token = token;
  }
}

export class CandidateFrequencyError extends AnnotationError {
  readonly candidate: string;
  readonly frequency: string;

  constructor(candidate: string, frequency: string) {
    super(
      "CANDIDATE_FREQUENCY",
      `Candidate "${candidate}" has a non-numeric frequency "${frequency}".`
    );
    this.candidate = candidate;
    this.frequency = frequency;
  }
}

/** The progress file could not be written; the in-memory table is still current. */
export class ProgressPersistError extends AnnotationError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super("PROGRESS_PERSIST", `Failed to write progress file: ${filePath}`, options);
    this.filePath = filePath;
  }
}
