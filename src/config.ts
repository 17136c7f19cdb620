import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  TASKS_FILE: z.string().min(1).default("merge_jian_fan_freq_lt100_20241223_anno.csv"),
  PROGRESS_FILE: z.string().min(1).default("progress.csv"),
  DEFAULT_TO_PRE_CORRECTION: booleanFlag,
  REVIEW_LIMIT: z.coerce.number().int().min(1).default(500),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type AppConfig = {
  port: number;
  tasksFile: string;
  progressFile: string;
  defaultToPreCorrection: boolean;
  reviewLimit: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
};

/** Reads configuration from the environment; relative paths resolve against `cwd`. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    tasksFile: path.resolve(cwd, parsed.TASKS_FILE),
    progressFile: path.resolve(cwd, parsed.PROGRESS_FILE),
    defaultToPreCorrection: parsed.DEFAULT_TO_PRE_CORRECTION,
    reviewLimit: parsed.REVIEW_LIMIT,
    logLevel: parsed.LOG_LEVEL
  };
}

/** Startup variant of `loadConfig`: invalid settings are logged as fatal and end the process. */
export function loadConfigOrExit(
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
  exit: (code: number) => never = process.exit
): AppConfig {
  try {
    return loadConfig(env);
  } catch (error) {
    logger.fatal({ err: error }, "Invalid configuration");
    return exit(1);
  }
}
