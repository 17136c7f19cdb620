import type { Logger } from "pino";
import { AnnotationSession } from "./annotationSession.js";
import type { AppConfig } from "./config.js";
import { ProgressStore } from "./services/progressStore.js";

export type SessionSettings = Pick<
  AppConfig,
  "tasksFile" | "progressFile" | "defaultToPreCorrection"
>;

/**
 * Opens (or creates) the progress file and starts the single operator session
 * on the first row that still needs a decision.
 */
export function openSession(settings: SessionSettings, logger?: Logger): AnnotationSession {
  const store = ProgressStore.loadOrInit({
    progressFile: settings.progressFile,
    tasksFile: settings.tasksFile,
    logger
  });
  const session = new AnnotationSession({
    store,
    policy: { defaultToPreCorrection: settings.defaultToPreCorrection },
    logger
  });

  logger?.info(
    {
      sessionId: session.id,
      rows: store.rowCount,
      annotated: store.annotatedCount,
      startIndex: session.currentIndex,
      defaultToPreCorrection: session.policy.defaultToPreCorrection
    },
    "Annotation session started"
  );
  return session;
}
