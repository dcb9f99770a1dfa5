/**
 * Gateway configuration: optional YAML file, overlaid with environment
 * variables, validated with zod and frozen.
 *
 * The registry never reads configuration itself; callers load a
 * `GatewayConfig` here and hand `providers` to it.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ValidationError } from "@veracity/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import type { BackendType } from "./types.js";
import { BackendTypeSchema, type GatewayConfig, toValidationIssues, validateGatewayConfig } from "./validation.js";

export type Env = Readonly<Record<string, string | undefined>>;

/** Provider order when neither the file nor AI_PROVIDERS declares one */
export const DEFAULT_PROVIDER_ORDER: readonly BackendType[] = ["gemini", "openai", "dify", "iflow", "anthropic"];

const PLACEHOLDER_KEYS: ReadonlySet<string> = new Set([
  "your-api-key",
  "your-gemini-api-key",
  "sk-your-openai-api-key",
  "app-your-dify-api-key",
  "your-key-here",
  "replace-with-your-key",
]);

/** Values copied verbatim from sample configuration files */
export function isPlaceholderKey(key: string): boolean {
  const lower = key.trim().toLowerCase();
  return PLACEHOLDER_KEYS.has(lower) || lower.startsWith("your-") || lower.includes("placeholder");
}

/** Several keys may share one variable, separated by commas or whitespace. */
export function splitKeys(value: string): string[] {
  return value.split(/[\s,]+/).filter((key) => key.length > 0);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const seconds = z.preprocess(blankToUndefined, z.coerce.number().nonnegative().optional());
const count = z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional());
const flag = z.preprocess(
  blankToUndefined,
  z
    .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
    .transform((value) => ["true", "1", "yes", "on"].includes(value))
    .optional(),
);

const EnvSchema = z.object({
  AI_PROVIDERS: z.string().optional(),
  API_TIMEOUT: seconds,
  API_RETRY_COUNT: count,
  API_RETRY_DELAY: seconds,
  KEY_SPACING_SECONDS: seconds,
  WAITING_INDICATORS: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value),
    flag,
  ),
  WAITING_TEXT: z.string().optional(),
  WAITING_DELAY: seconds,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value),
    z.string().optional(),
  ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function parseEnv(env: Env): ParsedEnv {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid environment: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }
  return result.data;
}

interface ProviderDeclaration {
  readonly id: string;
  readonly name?: string;
  readonly type: string;
}

/**
 * `id:name:type;id:name:type`. The type defaults to the id, the name to
 * the backend's own display name.
 */
export function parseProviderList(value: string): ProviderDeclaration[] {
  return value
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [id = "", name, type] = entry.split(":").map((part) => part.trim());
      return {
        id,
        ...(name ? { name } : {}),
        type: type || id,
      };
    });
}

/** Per-backend variables; `undefined` entries were not set */
function backendEnv(type: string, env: Env): Record<string, unknown> {
  const prefix = type.toUpperCase();
  const read = (name: string): string | undefined => {
    const value = env[`${prefix}_${name}`]?.trim();
    return value ? value : undefined;
  };
  const keys = read("API_KEY");
  const overlay: Record<string, unknown> = {};
  if (keys !== undefined) overlay.keys = splitKeys(keys);
  const model = read("MODEL");
  if (model !== undefined) overlay.model = model;
  const baseUrl = read("BASE_URL");
  if (baseUrl !== undefined) overlay.baseUrl = baseUrl;
  const appId = read("APP_ID");
  if (appId !== undefined) overlay.appId = appId;
  return overlay;
}

// ---------------------------------------------------------------------------
// File
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseConfigYaml(text: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const line = error.linePos?.[0]?.line;
      throw new ValidationError({
        code: "CONFIG_INVALID",
        message: `${source}: YAML syntax error${line === undefined ? "" : ` at line ${line}`}: ${error.message}`,
        cause: error,
      });
    }
    throw new ValidationError({ code: "CONFIG_INVALID", message: `${source}: ${String(error)}` });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError({ code: "CONFIG_INVALID", message: `${source}: top level must be a mapping` });
  }
  return parsed;
}

/** Accepts `key: single` as well as `keys: [...]`. */
function normalizeFileProvider(entry: unknown): unknown {
  if (!isRecord(entry)) return entry;
  const { key, keys, ...rest } = entry;
  if (keys !== undefined || key === undefined) return { ...rest, ...(keys !== undefined ? { keys } : {}) };
  return { ...rest, keys: typeof key === "string" ? splitKeys(key) : key };
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

function dropPlaceholders(provider: Record<string, unknown>): Record<string, unknown> {
  const { keys } = provider;
  if (!Array.isArray(keys)) return provider;
  const list: unknown[] = keys;
  return { ...provider, keys: list.filter((key) => typeof key !== "string" || !isPlaceholderKey(key)) };
}

function mergeProviders(fileProviders: unknown, env: Env, parsedEnv: ParsedEnv): unknown {
  if (fileProviders !== undefined && !Array.isArray(fileProviders)) return fileProviders;
  const entries: unknown[] = Array.isArray(fileProviders) ? fileProviders : [];
  const fromFile = entries.map(normalizeFileProvider);

  const byId = new Map<string, Record<string, unknown>>();
  for (const entry of fromFile) {
    if (isRecord(entry) && typeof entry.id === "string") byId.set(entry.id, entry);
  }

  let declared: Record<string, unknown>[];
  if (parsedEnv.AI_PROVIDERS?.trim()) {
    declared = parseProviderList(parsedEnv.AI_PROVIDERS).map((d) => ({ ...byId.get(d.id), ...d }));
  } else if (fromFile.length > 0) {
    // Schema validation reports malformed file entries
    return fromFile.map((entry) => (isRecord(entry) ? overlay(entry, env, parsedEnv) : entry));
  } else {
    declared = DEFAULT_PROVIDER_ORDER.map((type) => ({ id: type, type }));
  }
  return declared.map((entry) => overlay(entry, env, parsedEnv));
}

function overlay(entry: Record<string, unknown>, env: Env, parsedEnv: ParsedEnv): Record<string, unknown> {
  const type = BackendTypeSchema.safeParse(entry.type);
  const merged: Record<string, unknown> = {
    ...entry,
    ...(type.success ? backendEnv(type.data, env) : {}),
  };
  if (parsedEnv.API_TIMEOUT !== undefined) merged.timeoutMs = Math.round(parsedEnv.API_TIMEOUT * 1000);
  if (parsedEnv.API_RETRY_COUNT !== undefined) merged.maxAttempts = parsedEnv.API_RETRY_COUNT;
  if (parsedEnv.API_RETRY_DELAY !== undefined) merged.retryDelayMs = Math.round(parsedEnv.API_RETRY_DELAY * 1000);
  if (parsedEnv.KEY_SPACING_SECONDS !== undefined) {
    merged.minKeySpacingMs = Math.round(parsedEnv.KEY_SPACING_SECONDS * 1000);
  }
  return dropPlaceholders(merged);
}

function mergeWaiting(fileWaiting: unknown, parsedEnv: ParsedEnv): unknown {
  if (fileWaiting !== undefined && !isRecord(fileWaiting)) return fileWaiting;
  const base = isRecord(fileWaiting) ? fileWaiting : {};
  return {
    ...base,
    ...(parsedEnv.WAITING_INDICATORS !== undefined ? { enabled: parsedEnv.WAITING_INDICATORS } : {}),
    ...(parsedEnv.WAITING_TEXT !== undefined ? { text: parsedEnv.WAITING_TEXT } : {}),
    ...(parsedEnv.WAITING_DELAY !== undefined ? { delayMs: Math.round(parsedEnv.WAITING_DELAY * 1000) } : {}),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
  return value;
}

export interface ResolveConfigOptions {
  /** Defaults to process.env */
  readonly env?: Env;
  /** Used as the prefix of error messages */
  readonly source?: string;
}

/**
 * Build a validated configuration from YAML text (may be empty) and the
 * environment. Environment values win over file values.
 */
export function resolveGatewayConfig(yamlText: string, options: ResolveConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const source = options.source ?? "config";
  const file = yamlText.trim() ? parseConfigYaml(yamlText, source) : {};
  const parsedEnv = parseEnv(env);

  const merged: Record<string, unknown> = {
    ...file,
    providers: mergeProviders(file.providers, env, parsedEnv),
    waiting: mergeWaiting(file.waiting, parsedEnv),
    ...(parsedEnv.LOG_LEVEL !== undefined ? { logLevel: parsedEnv.LOG_LEVEL } : {}),
  };

  return deepFreeze(validateGatewayConfig(merged));
}

export interface LoadConfigOptions {
  /** YAML file; environment only when omitted */
  readonly file?: string;
  readonly env?: Env;
}

/**
 * Read the optional YAML file and resolve it against the environment.
 */
export async function loadGatewayConfig(options: LoadConfigOptions = {}): Promise<GatewayConfig> {
  if (options.file === undefined) return resolveGatewayConfig("", { env: options.env });

  const path = resolve(options.file);
  let text: string;
  try {
    text = await readFile(path, { encoding: "utf-8" });
  } catch (error: unknown) {
    throw new ValidationError({
      code: "CONFIG_FILE_UNREADABLE",
      message: `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return resolveGatewayConfig(text, { env: options.env, source: path });
}
