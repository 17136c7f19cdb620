export const NOT_A_WORD = "N/A";

export const COLUMNS = {
  originalForm: "原形",
  preCorrection: "校对前",
  corrected: "校对后",
  candidates: "候选项"
} as const;

export type ColumnKey = keyof typeof COLUMNS;

export const REQUIRED_COLUMNS: readonly string[] = [
  COLUMNS.originalForm,
  COLUMNS.preCorrection,
  COLUMNS.corrected,
  COLUMNS.candidates
];

export type TableRecord = Record<string, string>;

export type Table = {
  columns: string[];
  records: TableRecord[];
};

export type TaskRow = {
  originalForm: string;
  preCorrection: string;
  candidates: string;
};

export type ProgressRow = TaskRow & {
  corrected: string;
};

export type Candidate = {
  text: string;
  frequency: string;
};

export type AnnotationState = "unannotated" | "not-a-word" | "annotated";

export type SelectionPolicy = {
  defaultToPreCorrection: boolean;
};

export type CandidateView = Candidate & {
  selected: boolean;
};

export type ProgressSummary = {
  annotated: number;
  total: number;
};

export type ReviewEntry = {
  index: number;
  originalForm: string;
  corrected: string;
};

export type SessionView = {
  sessionId: string;
  startedAt: string;
  index: number;
  position: number;
  total: number;
  row: ProgressRow;
  state: AnnotationState;
  selection: string[];
  selectionText: string;
  notAWord: boolean;
  candidates: CandidateView[];
  progress: ProgressSummary;
  policy: SelectionPolicy;
};

export type SessionCommand =
  | { type: "toggle"; token: string }
  | { type: "toggle-not-a-word" }
  | { type: "navigate"; delta: number }
  | { type: "jump"; index: number }
  | { type: "save" };
