import type { AnnotationSession } from "../annotationSession.js";
import { NOT_A_WORD, type SessionCommand, type SessionView } from "../types.js";

export const EMPTY_SELECTION_TEXT = "暂无";

export function renderSessionView(session: AnnotationSession): SessionView {
  const row = session.getCurrentRow();
  const selection = [...session.selection];
  return {
    sessionId: session.id,
    startedAt: session.startedAt,
    index: session.currentIndex,
    position: session.currentIndex + 1,
    total: session.rowCount,
    row,
    state: session.annotationState(),
    selection,
    selectionText: selection.length > 0 ? selection.join(" ") : EMPTY_SELECTION_TEXT,
    notAWord: selection.includes(NOT_A_WORD),
    candidates: session.getCandidatesForCurrentRow().map((candidate) => ({
      ...candidate,
      selected: session.isSelected(candidate.text)
    })),
    progress: session.getProgressSummary(),
    policy: { ...session.policy }
  };
}

/** Applies exactly one operator gesture, then renders the resulting state once. */
export function dispatchCommand(session: AnnotationSession, command: SessionCommand): SessionView {
  switch (command.type) {
    case "toggle":
      session.toggle(command.token);
      break;
    case "toggle-not-a-word":
      session.toggleNotAWord();
      break;
    case "navigate":
      session.navigate(command.delta);
      break;
    case "jump":
      session.jump(command.index);
      break;
    case "save":
      session.save();
      break;
    default: {
      const unreachable: never = command;
      throw new Error(`Unknown command: ${JSON.stringify(unreachable)}`);
    }
  }
  return renderSessionView(session);
}
