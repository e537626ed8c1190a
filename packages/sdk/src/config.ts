/**
 * Store option and environment resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import type { z } from "zod";
import type { BackendOptions, BackingStore, EngineOptions, LogLevel, StoreOptions } from "./types.js";
import { ConfigError } from "./errors.js";
import { defaultSerializer } from "./format.js";
import { BackendOptionsSchema, EnvSchema, StoreOptionsSchema } from "./schemas.js";

export const DEFAULT_LARGE_VALUE_LIMIT = 1048576;
export const DEFAULT_ROOT = "./data";

export interface EnvOptions {
  logLevel?: LogLevel;
  largeValueLimit?: number;
  root?: string;
}

export interface ResolvedOptions {
  backend: BackendOptions | BackingStore;
  engine: EngineOptions;
  logLevel: LogLevel;
  root: string;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left untouched
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Read ATTRSTORE_* overrides from the environment
 * @throws ConfigError if a variable is set to an invalid value
 */
export function resolveEnvOptions(env: NodeJS.ProcessEnv = process.env): EnvOptions {
  const parsed = EnvSchema.safeParse({
    ATTRSTORE_LOG_LEVEL: env.ATTRSTORE_LOG_LEVEL || undefined,
    ATTRSTORE_LARGE_VALUE_LIMIT: env.ATTRSTORE_LARGE_VALUE_LIMIT || undefined,
    ATTRSTORE_ROOT: env.ATTRSTORE_ROOT || undefined,
  });
  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", formatIssues(parsed.error));
  }

  const { ATTRSTORE_LOG_LEVEL, ATTRSTORE_LARGE_VALUE_LIMIT, ATTRSTORE_ROOT } = parsed.data;
  return {
    logLevel: ATTRSTORE_LOG_LEVEL,
    largeValueLimit: ATTRSTORE_LARGE_VALUE_LIMIT,
    root: ATTRSTORE_ROOT === undefined ? undefined : path.resolve(expandTilde(ATTRSTORE_ROOT)),
  };
}

function isBackingStore(backend: BackendOptions | BackingStore): backend is BackingStore {
  return !("kind" in backend);
}

/**
 * Validate store options and merge them with environment overrides.
 * Explicit options win over the environment.
 * @throws ConfigError if any option is invalid
 */
export function resolveOptions(
  options: StoreOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedOptions {
  const parsed = StoreOptionsSchema.safeParse({
    entityTypes: options.entityTypes,
    largeValueLimit: options.largeValueLimit,
    logLevel: options.logLevel,
  });
  if (!parsed.success) {
    throw new ConfigError("Invalid store options", formatIssues(parsed.error));
  }

  const backend = options.backend ?? { kind: "memory" };
  if (!isBackingStore(backend)) {
    const checked = BackendOptionsSchema.safeParse(backend);
    if (!checked.success) {
      throw new ConfigError("Invalid backend options", formatIssues(checked.error));
    }
  }

  if (options.serialize !== undefined && typeof options.serialize !== "function") {
    throw new ConfigError("Invalid store options", ["serialize: must be a function"]);
  }

  const fromEnv = resolveEnvOptions(env);
  return {
    backend,
    engine: {
      entityTypes: parsed.data.entityTypes,
      largeValueLimit: parsed.data.largeValueLimit ?? fromEnv.largeValueLimit ?? DEFAULT_LARGE_VALUE_LIMIT,
      serialize: options.serialize ?? defaultSerializer,
    },
    logLevel: parsed.data.logLevel ?? fromEnv.logLevel ?? "info",
    root: fromEnv.root ?? path.resolve(DEFAULT_ROOT),
  };
}
