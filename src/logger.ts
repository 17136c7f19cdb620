import { pino, type LevelWithSilent, type Logger } from "pino";

export type LoggerConfig = {
  level?: LevelWithSilent;
  base?: Record<string, unknown>;
};

const DEFAULT_CONFIG: Required<LoggerConfig> = {
  level: "info",
  base: {
    service: "candidate-review"
  }
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };
  return pino({
    level: merged.level,
    base: merged.base
  });
}
