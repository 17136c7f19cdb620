import "dotenv/config";
import type { AnnotationSession } from "./annotationSession.js";
import { createApp } from "./app.js";
import { loadConfigOrExit } from "./config.js";
import { createLogger } from "./logger.js";
import { openSession } from "./sessionStore.js";

const config = loadConfigOrExit(createLogger());
const logger = createLogger({ level: config.logLevel });

function startSession(): AnnotationSession {
  try {
    return openSession(config, logger);
  } catch (error) {
    logger.fatal({ err: error }, "Unable to start annotation session");
    process.exit(1);
  }
}

const app = createApp({ session: startSession(), logger, reviewLimit: config.reviewLimit });

app.listen(config.port, () => {
  logger.info(
    { port: config.port, tasksFile: config.tasksFile, progressFile: config.progressFile },
    `Annotation service listening on http://localhost:${config.port}`
  );
});
