/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { describeError } from "@histsync/core";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import type {
  BatchingConfigRaw,
  CollectionConfigRaw,
  ConfigFile,
  DriverConfig,
} from "./config.js";

type Env = { [name: string]: string | undefined };
type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a JSONC configuration file.
 * @param configPath - Path to the JSONC configuration file
 * @returns Parsed configuration with environment variables expanded
 * @throws Error if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(
  configPath: string,
  env: Env = process.env
): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return parseConfig(content, env);
  } catch (error) {
    throw new Error(`Failed to load config from ${fullPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Parse configuration text (JSONC, comments and trailing commas allowed).
 */
export function parseConfig(content: string, env: Env = process.env): ConfigFile {
  const errors: ParseError[] = [];
  const raw: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const messages = errors.map(
      (e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`
    );
    throw new Error(`Failed to parse JSONC file: ${messages.join(", ")}`);
  }

  return validateConfig(expandEnvironmentVariables(raw, env));
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax. Unknown variables without a
 * default are left as written.
 */
function expandEnvVar(value: string, env: Env): string {
  return value.replace(
    /\$\{([^}:-]+)(?::-([^}]*))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return match;
    }
  );
}

/**
 * Recursively expand environment variables in every string of a parsed value.
 */
export function expandEnvironmentVariables(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => expandEnvironmentVariables(item, env));
  }

  if (isObject(value)) {
    const expanded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvironmentVariables(item, env);
    }
    return expanded;
  }

  return value;
}

/**
 * Validate the structure of the configuration object.
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: unknown): ConfigFile {
  if (!isObject(config)) {
    throw new Error("Configuration file must contain an object");
  }

  const scratchpad = validateDriver(config.scratchpad ?? { driver: "in-memory" }, "scratchpad");

  if (!Array.isArray(config.collections)) {
    throw new Error("Configuration must include 'collections' array");
  }

  const collections = config.collections.map((collection) => validateCollection(collection));
  const ids = new Set<string>();
  const types = new Set<string>();
  for (const collection of collections) {
    if (ids.has(collection.id)) {
      throw new Error(`Duplicate collection id '${collection.id}'`);
    }
    // Cursors are kept per collection type.
    if (types.has(collection.type)) {
      throw new Error(`Collection '${collection.id}': type '${collection.type}' is already configured`);
    }
    ids.add(collection.id);
    types.add(collection.type);
  }

  return { scratchpad, collections };
}

/**
 * Validate a single collection configuration.
 */
function validateCollection(collection: unknown): CollectionConfigRaw {
  const id = isObject(collection) ? collection.id : undefined;
  if (!isObject(collection) || typeof id !== "string" || !id) {
    throw new Error("Each collection must have a string 'id'");
  }

  const type = collection.type ?? id;
  if (type !== "history") {
    throw new Error(`Collection '${id}': unsupported type '${String(type)}'`);
  }

  const { enabled, schedule } = collection;
  if (enabled !== undefined && typeof enabled !== "boolean") {
    throw new Error(`Collection '${id}': 'enabled' must be a boolean`);
  }

  if (schedule !== undefined && typeof schedule !== "string") {
    throw new Error(`Collection '${id}': 'schedule' must be a cron expression string`);
  }

  const result: CollectionConfigRaw = {
    id,
    type,
    enabled,
    schedule,
    storage: validateDriver(collection.storage, `Collection '${id}', storage`),
    server: validateDriver(collection.server, `Collection '${id}', server`),
  };

  if (collection.batching !== undefined) {
    result.batching = validateBatching(id, collection.batching);
  }
  if (collection.upload_baseline !== undefined) {
    result.upload_baseline = validateNumber(id, "upload_baseline", collection.upload_baseline);
  }
  if (collection.remote_storage_version !== undefined) {
    result.remote_storage_version = validateNumber(
      id,
      "remote_storage_version",
      collection.remote_storage_version
    );
  }

  return result;
}

function validateDriver(driver: unknown, context: string): DriverConfig {
  if (!isObject(driver) || typeof driver.driver !== "string") {
    throw new Error(`${context}: must have a 'driver' string`);
  }

  if (driver.driver === "in-memory") {
    return { driver: "in-memory" };
  }

  if (driver.driver === "module") {
    const { path: modulePath, options } = driver;
    if (typeof modulePath !== "string" || !modulePath) {
      throw new Error(`${context}: module driver must have a 'path' string`);
    }
    if (options !== undefined && !isObject(options)) {
      throw new Error(`${context}: 'options' must be an object`);
    }
    return { driver: "module", path: modulePath, options };
  }

  throw new Error(`${context}: unknown driver '${driver.driver}'`);
}

function validateBatching(id: string, batching: unknown): BatchingConfigRaw {
  if (!isObject(batching)) {
    throw new Error(`Collection '${id}': 'batching' must be an object`);
  }
  const result: BatchingConfigRaw = {};
  if (batching.deletions !== undefined) {
    result.deletions = validateBatchSize(id, "batching.deletions", batching.deletions);
  }
  if (batching.modifications !== undefined) {
    result.modifications = validateBatchSize(id, "batching.modifications", batching.modifications);
  }
  return result;
}

function validateBatchSize(id: string, field: string, value: unknown): number {
  const size = validateNumber(id, field, value);
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Collection '${id}': ${field} must be a positive integer`);
  }
  return size;
}

/**
 * Numbers may arrive as strings after environment expansion.
 */
function validateNumber(id: string, field: string, value: unknown): number {
  const number = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof number !== "number" || Number.isNaN(number)) {
    throw new Error(`Collection '${id}': ${field} must be a number`);
  }
  return number;
}
