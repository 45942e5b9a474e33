/**
 * Configuration for the Inference Service
 *
 * Read once from the environment (and .env) and validated; any problem is
 * fatal at startup.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { parseKeyList, type CredentialSet } from "@llamahost/auth";
import { parseOrigins, type LogLevel } from "@llamahost/http";
import type { ModelOptions } from "./llama/backend.js";
import type { ChatTemplateName } from "./completions/chat-template.js";

dotenv.config();

export const SERVICE_VERSION = "0.1.0";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(1133),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  API_KEYS: z.string({ required_error: "API_KEYS is required" }),
  ADMIN_API_KEY: z.string().optional(),
  ADMIN_API_KEYS: z.string().optional(),

  MODEL_PATH: z.string().min(1).default("./models/model.gguf"),
  MODEL_NAME: z.string().min(1).default("llama-3-8b"),
  N_CTX: z.coerce.number().int().positive().default(4096),
  N_BATCH: z.coerce.number().int().positive().default(512),
  N_GPU_LAYERS: z.coerce.number().int().min(-1).default(-1),
  N_THREADS: z.coerce.number().int().positive().default(8),
  USE_MLOCK: booleanFlag.default("true"),
  USE_MMAP: booleanFlag.default("true"),

  CHAT_TEMPLATE: z.enum(["llama3", "chatml"]).default("llama3"),
  MAX_CONCURRENT_GENERATIONS: z.coerce.number().int().positive().default(1),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  MAX_TOKENS_LIMIT: z.coerce.number().int().positive().default(32000),

  CORS_ALLOWED_ORIGINS: z.string().default(""),
  TELEMETRY_ENABLED: booleanFlag.default("true"),
});

export interface Config {
  host: string;
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  version: string;

  credentials: CredentialSet;

  modelName: string;
  model: ModelOptions;
  chatTemplate: ChatTemplateName;

  maxConcurrentGenerations: number;
  generationTimeoutMs: number;
  maxTokensLimit: number;

  corsOrigins: string[];
  telemetryEnabled: boolean;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Empty variables count as unset so defaults apply
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const standardKeys = parseKeyList(vars.API_KEYS);
  const adminKeys = [...parseKeyList(vars.ADMIN_API_KEY), ...parseKeyList(vars.ADMIN_API_KEYS)];

  const issues: string[] = [];
  if (standardKeys.length === 0) {
    issues.push("API_KEYS: at least one API key must be configured");
  }
  if (adminKeys.length === 0) {
    issues.push("ADMIN_API_KEY: an admin API key must be configured");
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    host: vars.HOST,
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    version: SERVICE_VERSION,

    credentials: { standardKeys, adminKeys },

    modelName: vars.MODEL_NAME,
    model: {
      modelPath: vars.MODEL_PATH,
      contextSize: vars.N_CTX,
      batchSize: vars.N_BATCH,
      gpuLayers: vars.N_GPU_LAYERS,
      threads: vars.N_THREADS,
      useMlock: vars.USE_MLOCK,
      useMmap: vars.USE_MMAP,
    },
    chatTemplate: vars.CHAT_TEMPLATE,

    maxConcurrentGenerations: vars.MAX_CONCURRENT_GENERATIONS,
    generationTimeoutMs: vars.GENERATION_TIMEOUT_MS,
    maxTokensLimit: vars.MAX_TOKENS_LIMIT,

    corsOrigins: parseOrigins(vars.CORS_ALLOWED_ORIGINS),
    telemetryEnabled: vars.TELEMETRY_ENABLED,
  };
}
