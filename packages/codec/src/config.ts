import { Result } from "better-result";
import { ValidationError } from "@nlroute/errors";
import { isLogLevel, type LogLevel } from "@nlroute/logger";
import { DEFAULT_MAX_NESTING_DEPTH } from "./attribute-set.js";

export const MAX_NESTING_DEPTH_LIMIT = 1024;

export interface CodecConfig {
  maxNestingDepth: number;
  logLevel: LogLevel;
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
  logLevel: "warn",
};

export function parseMaxNestingDepth(value: string | undefined): Result<number, ValidationError> {
  if (!value) {
    return Result.ok(DEFAULT_CODEC_CONFIG.maxNestingDepth);
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_NESTING_DEPTH_LIMIT) {
    return Result.err(
      new ValidationError({
        message: `NLROUTE_MAX_NESTING_DEPTH must be an integer between 1 and ${MAX_NESTING_DEPTH_LIMIT}`,
        field: "NLROUTE_MAX_NESTING_DEPTH",
      })
    );
  }

  return Result.ok(parsed);
}

export function parseLogLevel(value: string | undefined): Result<LogLevel, ValidationError> {
  if (!value) {
    return Result.ok(DEFAULT_CODEC_CONFIG.logLevel);
  }

  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    return Result.err(
      new ValidationError({
        message: "NLROUTE_LOG_LEVEL must be one of debug, info, warn, error, silent",
        field: "NLROUTE_LOG_LEVEL",
      })
    );
  }

  return Result.ok(level);
}

/**
 * Read codec settings from the environment
 */
export function loadCodecConfig(
  env: Record<string, string | undefined> = process.env
): Result<CodecConfig, ValidationError> {
  const maxNestingDepth = parseMaxNestingDepth(env.NLROUTE_MAX_NESTING_DEPTH);
  if (maxNestingDepth.isErr()) {
    return Result.err(maxNestingDepth.error);
  }

  const logLevel = parseLogLevel(env.NLROUTE_LOG_LEVEL);
  if (logLevel.isErr()) {
    return Result.err(logLevel.error);
  }

  return Result.ok({ maxNestingDepth: maxNestingDepth.unwrap(), logLevel: logLevel.unwrap() });
}
