import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { IntentType, Priority } from "./types.js";
import { INTENT_TYPES, PRIORITIES } from "./types.js";
import type { LogLevel } from "./utils/logger.js";

export type OrchestratorConfig = {
  engine: {
    /** Global cap on concurrently dispatched steps, across plans. */
    maxConcurrentTasks: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    /**
     * How long an aborted attempt keeps its permit while the worker has not
     * settled. After that the permit is released and the worker is abandoned.
     */
    abandonAfterMs: number;
  };
  tasks: {
    defaultTimeoutSeconds: number;
    defaultMaxRetries: number;
    defaultPriority: Priority;
  };
  classifier: {
    fallbackIntent: IntentType;
    llmEnabled: boolean;
    /** Lexical scores at or above this skip the LLM call. */
    confidentScore: number;
  };
  planner: {
    defaultStepDurationSeconds: number;
  };
  llm: {
    provider: string;
    model: string;
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
    maxRetries: number;
    maxTokens: number;
    temperature: number;
  };
  limits: {
    /** In-memory task records kept for getStatus before the oldest are evicted. */
    maxTasks: number;
    historyLimit: number;
    outputTruncation: number;
    /** Sessions with activity inside this window count as active. */
    activeSessionWindowSeconds: number;
  };
  server: {
    port: number;
    host: string;
  };
  log: {
    level: LogLevel;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type ConfigOverrides = DeepPartial<OrchestratorConfig>;

const DEFAULTS: OrchestratorConfig = {
  engine: {
    maxConcurrentTasks: 10,
    retryBaseDelayMs: 250,
    retryMaxDelayMs: 5_000,
    abandonAfterMs: 30_000,
  },
  tasks: {
    defaultTimeoutSeconds: 300,
    defaultMaxRetries: 3,
    defaultPriority: "medium",
  },
  classifier: {
    fallbackIntent: "code_generation",
    llmEnabled: true,
    confidentScore: 2,
  },
  planner: {
    defaultStepDurationSeconds: 60,
  },
  llm: {
    provider: "openai",
    model: "gpt-4",
    baseUrl: "https://api.openai.com/v1",
    timeoutMs: 30_000,
    maxRetries: 3,
    maxTokens: 4_000,
    temperature: 0.7,
  },
  limits: {
    maxTasks: 500,
    historyLimit: 20,
    outputTruncation: 3_000,
    activeSessionWindowSeconds: 1_800,
  },
  server: {
    port: 8000,
    host: "127.0.0.1",
  },
  log: {
    level: "info",
  },
};

const OrchestratorConfigSchema = z.object({
  engine: z.object({
    maxConcurrentTasks: z.number().int().min(1).max(100),
    retryBaseDelayMs: z.number().int().min(0),
    retryMaxDelayMs: z.number().int().min(0),
    abandonAfterMs: z.number().int().min(0),
  }),
  tasks: z.object({
    defaultTimeoutSeconds: z.number().int().min(1).max(3600),
    defaultMaxRetries: z.number().int().min(0).max(10),
    defaultPriority: z.enum(PRIORITIES),
  }),
  classifier: z.object({
    fallbackIntent: z.enum(INTENT_TYPES),
    llmEnabled: z.boolean(),
    confidentScore: z.number().int().min(1),
  }),
  planner: z.object({
    defaultStepDurationSeconds: z.number().int().min(1),
  }),
  llm: z.object({
    provider: z.string().min(1),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().min(1),
    maxRetries: z.number().int().min(0).max(10),
    maxTokens: z.number().int().min(1),
    temperature: z.number().min(0).max(2),
  }),
  limits: z.object({
    maxTasks: z.number().int().min(1),
    historyLimit: z.number().int().min(1),
    outputTruncation: z.number().int().min(1),
    activeSessionWindowSeconds: z.number().int().min(1),
  }),
  server: z.object({
    port: z.number().int().min(0).max(65_535),
    host: z.string().min(1),
  }),
  log: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
  }),
});

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: ConfigOverrides): void {
  const result = OrchestratorConfigSchema.safeParse(deepMerge(DEFAULTS, overrides));
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${msg}`);
  }
  current = result.data;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));

const intFromEnv = z.coerce.number().int();

const ENV_BINDINGS: Array<{ env: string; path: [keyof OrchestratorConfig, string]; parse: z.ZodTypeAny }> = [
  { env: "ORCH_MAX_CONCURRENT_TASKS", path: ["engine", "maxConcurrentTasks"], parse: intFromEnv },
  { env: "ORCH_RETRY_BASE_DELAY_MS", path: ["engine", "retryBaseDelayMs"], parse: intFromEnv },
  { env: "ORCH_TASK_TIMEOUT_SECONDS", path: ["tasks", "defaultTimeoutSeconds"], parse: intFromEnv },
  { env: "ORCH_TASK_MAX_RETRIES", path: ["tasks", "defaultMaxRetries"], parse: intFromEnv },
  { env: "ORCH_FALLBACK_INTENT", path: ["classifier", "fallbackIntent"], parse: z.enum(INTENT_TYPES) },
  { env: "ORCH_LLM_ENABLED", path: ["classifier", "llmEnabled"], parse: z.enum(["true", "false"]).transform((v) => v === "true") },
  { env: "ORCH_LLM_PROVIDER", path: ["llm", "provider"], parse: z.string().min(1) },
  { env: "ORCH_LLM_MODEL", path: ["llm", "model"], parse: z.string().min(1) },
  { env: "ORCH_LLM_BASE_URL", path: ["llm", "baseUrl"], parse: z.string().url() },
  { env: "ORCH_LLM_API_KEY", path: ["llm", "apiKey"], parse: z.string().min(1) },
  { env: "ORCH_LLM_TIMEOUT_MS", path: ["llm", "timeoutMs"], parse: intFromEnv },
  { env: "ORCH_PORT", path: ["server", "port"], parse: intFromEnv },
  { env: "ORCH_HOST", path: ["server", "host"], parse: z.string().min(1) },
  { env: "ORCH_LOG_LEVEL", path: ["log", "level"], parse: z.enum(["debug", "info", "warn", "error"]) },
];

/**
 * Build config overrides from `ORCH_*` environment variables.
 * Unset variables are ignored; malformed ones raise a ConfigError naming the variable.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: Record<string, Record<string, unknown>> = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.env];
    if (raw === undefined || raw === "") continue;
    const parsed = binding.parse.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${binding.env}: ${JSON.stringify(raw)}`, { variable: binding.env });
    }
    const [section, key] = binding.path;
    overrides[section] = { ...overrides[section], [key]: parsed.data };
  }
  const validated = OrchestratorConfigSchema.deepPartial().safeParse(overrides);
  if (!validated.success) {
    const msg = validated.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment configuration: ${msg}`);
  }
  return validated.data;
}
