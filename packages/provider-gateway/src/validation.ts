import { ValidationError, type ValidationIssue } from "@veracity/errors";
import { z } from "zod";
import type { LogLevel } from "./logger.js";
import type { ProviderConfig } from "./types.js";

export const BackendTypeSchema = z.enum(["gemini", "openai", "anthropic", "dify", "iflow"]);

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const positiveMs = z.number().int().positive();

export const ProviderConfigSchema = z
  .object({
    id: z.string().min(1, "Provider id must not be empty"),
    type: BackendTypeSchema,
    name: z.string().min(1).optional(),
    keys: z.array(z.string()).default([]),
    model: z.string().min(1).optional(),
    models: z.array(z.string().min(1)).min(1).optional(),
    baseUrl: z.string().url().optional(),
    rotation: z.enum(["auto", "manual"]).optional(),
    minKeySpacingMs: z.number().int().nonnegative().optional(),
    maxAttempts: z.number().int().min(1).max(20).optional(),
    retryDelayMs: z.number().int().nonnegative().optional(),
    rateLimitDelayMs: z.number().int().nonnegative().optional(),
    timeoutMs: positiveMs.optional(),
    stream: z.boolean().optional(),
    appId: z.string().min(1).optional(),
    showThinking: z.boolean().optional(),
    promptTemplate: z.string().min(1).optional(),
  })
  .strict();

export const WaitingConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    text: z.string().default("evaluating"),
    delayMs: z.number().int().nonnegative().default(1000),
  })
  .strict();

export const GatewayConfigSchema = z
  .object({
    providers: z
      .array(ProviderConfigSchema)
      .superRefine((providers, ctx) => {
        const seen = new Set<string>();
        providers.forEach((provider, index) => {
          if (seen.has(provider.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, "id"],
              message: `Duplicate provider id "${provider.id}"`,
            });
          }
          seen.add(provider.id);
        });
      }),
    logLevel: LogLevelSchema.default("info"),
    waiting: WaitingConfigSchema.default({}),
    prompt: z.object({ template: z.string().min(1).optional() }).strict().default({}),
  })
  .strict();

export interface WaitingConfig {
  readonly enabled: boolean;
  readonly text: string;
  readonly delayMs: number;
}

export interface GatewayConfig {
  readonly providers: readonly ProviderConfig[];
  readonly logLevel: LogLevel;
  readonly waiting: WaitingConfig;
  readonly prompt: { readonly template?: string };
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate a merged configuration object, throwing CONFIG_INVALID with
 * field-level issues.
 */
export function validateGatewayConfig(value: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid gateway configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }
  return result.data;
}
