import type { Logger } from "winston";
import { createLogger, SILENT_LOG_LEVEL } from "./logger.js";
import type { JsonConvention, LambdaServerOptions } from "./server/types.js";

const DEFAULT_FUNCTION_ARN = "arn:aws:lambda:us-west-2:123412341234:function:Function";
const DEFAULT_FUNCTION_TIMEOUT_MS = 15 * 60 * 1000;
const DEFAULT_LOG_LEVEL = "warn";
// Largest delay a Node timer holds; longer ones fire after 1ms.
const MAX_FUNCTION_TIMEOUT_MS = 2_147_483_647;
const LOG_LEVELS = new Set([SILENT_LOG_LEVEL, "error", "warn", "info", "http", "verbose", "debug", "silly"]);

export type ResolvedServerOptions = {
  functionArn: string;
  functionTimeoutMs: number;
  additionalHeaders: Record<string, string>;
  json: JsonConvention;
  logger: Logger;
  signal?: AbortSignal;
};

export type ServerEnvConfig = {
  functionArn: string;
  functionTimeoutMs: number;
  logLevel: string;
};

const DEFAULT_JSON: JsonConvention = {
  stringify: (value) => JSON.stringify(value ?? null),
  parse: (text) => (text.length === 0 ? undefined : JSON.parse(text)),
};

function readString(envValue: string | undefined, fallback: string): string {
  const trimmed = envValue?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
}

function readTimeout(envValue: string | undefined, fallback: number): number {
  const trimmed = envValue?.trim();
  if (!trimmed) {
    return fallback;
  }

  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_FUNCTION_TIMEOUT_MS) {
    throw new Error(`Invalid LAMBDA_TEST_FUNCTION_TIMEOUT_MS value: ${trimmed}`);
  }

  return parsed;
}

function readLogLevel(envValue: string | undefined, fallback: string): string {
  const level = readString(envValue, fallback).toLowerCase();
  if (!LOG_LEVELS.has(level)) {
    throw new Error(`Invalid LAMBDA_TEST_LOG_LEVEL value: ${level}`);
  }

  return level;
}

export function parseServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnvConfig {
  return {
    functionArn: readString(env.LAMBDA_TEST_FUNCTION_ARN, DEFAULT_FUNCTION_ARN),
    functionTimeoutMs: readTimeout(env.LAMBDA_TEST_FUNCTION_TIMEOUT_MS, DEFAULT_FUNCTION_TIMEOUT_MS),
    logLevel: readLogLevel(env.LAMBDA_TEST_LOG_LEVEL, DEFAULT_LOG_LEVEL),
  };
}

/** Explicit options win over the environment, which wins over the defaults. */
export function resolveServerOptions(
  options: LambdaServerOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedServerOptions {
  const fromEnv = parseServerEnv(env);
  const functionTimeoutMs = options.functionTimeoutMs ?? fromEnv.functionTimeoutMs;
  if (!Number.isFinite(functionTimeoutMs) || functionTimeoutMs <= 0 || functionTimeoutMs > MAX_FUNCTION_TIMEOUT_MS) {
    throw new Error(`Invalid functionTimeoutMs value: ${functionTimeoutMs}`);
  }

  return {
    functionArn: options.functionArn ?? fromEnv.functionArn,
    functionTimeoutMs,
    additionalHeaders: { ...options.additionalHeaders },
    json: options.json ?? DEFAULT_JSON,
    logger: options.logger ?? createLogger(fromEnv.logLevel),
    ...(options.signal ? { signal: options.signal } : {}),
  };
}
