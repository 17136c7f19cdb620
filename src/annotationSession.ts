import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { EmptyDatasetError, InvalidTokenError } from "./errors.js";
import { parseCandidates, sortCandidatesByFrequency } from "./services/candidateParser.js";
import type { ProgressStore } from "./services/progressStore.js";
import {
  NOT_A_WORD,
  type AnnotationState,
  type Candidate,
  type ProgressRow,
  type ProgressSummary,
  type SelectionPolicy
} from "./types.js";

export type AnnotationSessionOptions = {
  store: ProgressStore;
  policy?: Partial<SelectionPolicy>;
  logger?: Logger;
};

const TOKEN_PATTERN = /^\S+$/;

export function isValidToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

export function splitTokens(value: string): string[] {
  return value
    .split(" ")
    .map((token) => token.trim())
    .filter(Boolean);
}

export function serializeSelection(selection: readonly string[]): string {
  if (selection.includes(NOT_A_WORD)) {
    return NOT_A_WORD;
  }
  return selection.join(" ");
}

export function classifyAnnotation(corrected: string): AnnotationState {
  if (corrected === "") {
    return "unannotated";
  }
  return corrected === NOT_A_WORD ? "not-a-word" : "annotated";
}

/**
 * Row-by-row annotation state for one operator. The pending selection is
 * written back to the store before the row pointer ever moves.
 */
export class AnnotationSession {
  readonly id: string;
  readonly startedAt: string;
  readonly store: ProgressStore;
  readonly policy: SelectionPolicy;
  private readonly logger?: Logger;
  private index = 0;
  private selected: string[] = [];

  constructor(options: AnnotationSessionOptions) {
    if (options.store.rowCount === 0) {
      throw new EmptyDatasetError(options.store.filePath);
    }

    this.id = uuidv4();
    this.startedAt = new Date().toISOString();
    this.store = options.store;
    this.policy = {
      defaultToPreCorrection: options.policy?.defaultToPreCorrection ?? false
    };
    this.logger = options.logger?.child({ sessionId: this.id });

    const firstOpen = this.store.firstUnannotatedIndex();
    this.enterRow(firstOpen >= 0 ? firstOpen : 0);
  }

  get currentIndex(): number {
    return this.index;
  }

  get selection(): readonly string[] {
    return this.selected;
  }

  get rowCount(): number {
    return this.store.rowCount;
  }

  /** Points the session at `index` and reloads its selection; nothing is committed. */
  enterRow(index: number): void {
    this.index = this.normalizeIndex(index);
    const row = this.store.getRow(this.index);
    let seed: string[] = [];
    if (row.corrected !== "") {
      seed = splitTokens(row.corrected);
    } else if (this.policy.defaultToPreCorrection) {
      seed = splitTokens(row.preCorrection);
    }
    this.selected = [...new Set(seed)];
  }

  getCurrentRow(): ProgressRow {
    return this.store.getRow(this.index);
  }

  getCandidatesForCurrentRow(): Candidate[] {
    return sortCandidatesByFrequency(parseCandidates(this.getCurrentRow().candidates));
  }

  annotationState(index: number = this.index): AnnotationState {
    return classifyAnnotation(this.store.getRow(index).corrected);
  }

  isSelected(token: string): boolean {
    return this.selected.includes(token);
  }

  toggle(token: string): void {
    if (!isValidToken(token)) {
      throw new InvalidTokenError(token);
    }
    const position = this.selected.indexOf(token);
    if (position >= 0) {
      this.selected.splice(position, 1);
    } else {
      this.selected.push(token);
    }
  }

  toggleNotAWord(): void {
    this.toggle(NOT_A_WORD);
  }

  /** Writes the pending selection into the current row and rewrites the progress file. */
  commitRow(): string {
    const value = serializeSelection(this.selected);
    this.store.setAnnotation(this.index, value);
    this.store.persist();
    this.logger?.debug({ index: this.index, corrected: value }, "Committed row");
    return value;
  }

  save(): string {
    return this.commitRow();
  }

  navigate(delta: number): void {
    this.commitRow();
    const target = Math.min(Math.max(this.index + delta, 0), this.rowCount - 1);
    this.enterRow(target);
  }

  jump(index: number): void {
    this.commitRow();
    this.enterRow(index);
  }

  getProgressSummary(): ProgressSummary {
    return {
      annotated: this.store.annotatedCount,
      total: this.store.rowCount
    };
  }

  export(): string {
    return this.store.toCsv();
  }

  private normalizeIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.rowCount) {
      return 0;
    }
    return index;
  }
}
