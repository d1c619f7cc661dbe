import { z } from "zod";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { createComponentLogger } from "./logging/index.js";

// ============================================================
// Zod Schemas
// ============================================================

export const TRANSPORTS = ["http", "cli", "rpc", "static"] as const;
export type Transport = (typeof TRANSPORTS)[number];

export const ModelDeclarationSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().optional(),
  /** USD per million tokens */
  costPerMillionTokens: z.number().min(0).optional(),
  contextWindow: z.number().int().positive().optional(),
  capabilities: z.array(z.string()).optional(),
});

export type ModelDeclaration = z.infer<typeof ModelDeclarationSchema>;

export const ExecutorDescriptorSchema = z.object({
  id: z.string().trim().min(1, "executor id is required"),
  transport: z.enum(TRANSPORTS, {
    errorMap: () => ({ message: `transport must be one of ${TRANSPORTS.join(", ")}` }),
  }),
  capabilities: z.array(z.string()).default([]),
  /** Base URL for http/rpc transports */
  endpoint: z.string().url().optional(),
  /** Executable for the cli transport */
  command: z.string().min(1).optional(),
  args: z.array(z.string()).default([]),
  /** Declared models; the full list for static executors, cost/metadata overrides for the rest */
  models: z.array(ModelDeclarationSchema).default([]),
  apiKey: z.string().optional(),
}).superRefine((descriptor, ctx) => {
  if ((descriptor.transport === "http" || descriptor.transport === "rpc") && !descriptor.endpoint) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["endpoint"], message: `${descriptor.transport} executors need an endpoint` });
  }
  if (descriptor.transport === "cli" && !descriptor.command) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["command"], message: "cli executors need a command" });
  }
});

export type ExecutorDescriptor = z.infer<typeof ExecutorDescriptorSchema>;
export type ExecutorDescriptorInput = z.input<typeof ExecutorDescriptorSchema>;

export const PolicySchema = z.object({
  domain: z.string().trim().min(1),
  action: z.string().trim().min(1),
  /** Preferred model ids, most preferred first */
  candidates: z.array(z.string().min(1)).default([]),
  priority: z.number().int().default(0),
});

export type Policy = z.infer<typeof PolicySchema>;
export type PolicyInput = z.input<typeof PolicySchema>;

export const RoutewiseConfigSchema = z.object({
  registry: z.object({
    /** How often every executor is probed */
    probeIntervalMs: z.number().int().min(100).default(5000),
    /** Per-probe timeout; a timeout marks the executor unhealthy */
    probeTimeoutMs: z.number().int().min(50).default(2000),
    /** Evict executors not seen live for this long */
    gracePeriodMs: z.number().int().min(0).default(60000),
    executors: z.array(ExecutorDescriptorSchema).default([]),
  }).default({}),

  classifier: z.object({
    /** External classification endpoint; the local heuristic classifier is used when absent */
    url: z.string().url().optional(),
    timeoutMs: z.number().int().min(10).max(10000).default(300),
    apiKey: z.string().optional(),
    fallback: z.object({
      domain: z.string().default("general"),
      action: z.string().default("chat"),
    }).default({}),
  }).default({}),

  policy: z.object({
    /** Remote policy store; an in-memory store seeded from `policies` is used when absent */
    url: z.string().url().optional(),
    ttlMs: z.number().int().min(0).default(30000),
    fetchTimeoutMs: z.number().int().min(10).default(1000),
    policies: z.array(PolicySchema).default([]),
  }).default({}),

  scoring: z.object({
    /** Ability checkpoint JSON file */
    checkpointPath: z.string().optional(),
    /** Weight of cost-per-million-tokens in the divisor */
    costWeight: z.number().min(0).default(0.1),
    /** Floor for the cost divisor */
    costEpsilon: z.number().positive().default(1e-6),
    /** Logit penalty for models without an ability vector */
    missingAbilityPenalty: z.number().min(0).default(1.0),
  }).default({}),

  features: z.object({
    maxContextTurns: z.number().int().min(0).max(100).default(8),
  }).default({}),

  decisionLog: z.object({
    enabled: z.boolean().default(true),
    dataDir: z.string().default(join(homedir(), ".routewise", "decisions")),
    flushIntervalMs: z.number().int().min(100).default(5000),
    flushBatchSize: z.number().int().min(1).default(50),
    ringSize: z.number().int().min(1).max(100000).default(500),
    /** Entries kept while the sink is unavailable; oldest are dropped beyond this */
    maxBuffered: z.number().int().min(1).default(5000),
  }).default({}),

  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    /** json for production, human for development */
    format: z.enum(["json", "human"]).default("human"),
    fileOutput: z.boolean().default(false),
    logDir: z.string().default(join(homedir(), ".routewise", "logs")),
    consoleOutput: z.boolean().default(true),
    includeStackTrace: z.boolean().default(true),
    colors: z.boolean().default(true),
  }).default({}),

  server: z.object({
    port: z.number().int().min(0).max(65535).default(7420),
    host: z.string().default("127.0.0.1"),
    /** Browser origins allowed by CORS; none by default */
    corsOrigins: z.array(z.string()).default([]),
    /** Routing sessions kept for POST /decisions/:id/next */
    sessionCacheSize: z.number().int().min(1).default(1000),
  }).default({}),
});

export type RoutewiseConfig = z.infer<typeof RoutewiseConfigSchema>;
export type RoutewiseConfigInput = z.input<typeof RoutewiseConfigSchema>;

export const DEFAULT_CONFIG: RoutewiseConfig = RoutewiseConfigSchema.parse({});

// ============================================================
// Configuration Loading Functions
// ============================================================

const logger = createComponentLogger("config");

/**
 * Formats zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Loads configuration from a JSON file or uses defaults.
 *
 * @param configPath - Defaults to $ROUTEWISE_CONFIG, then ./routewise.json
 */
export function loadConfig(configPath?: string): RoutewiseConfig {
  const path = configPath ?? process.env.ROUTEWISE_CONFIG ?? join(process.cwd(), "routewise.json");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.info("Config file not found, using defaults", { path });
      return DEFAULT_CONFIG;
    }
    logger.error("Failed to read config file, using defaults", error instanceof Error ? error : { error });
    return DEFAULT_CONFIG;
  }

  const result = RoutewiseConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  logger.warn("Config validation failed, using defaults", { path, issues: formatIssues(result.error) });
  return DEFAULT_CONFIG;
}

/**
 * Validates a raw configuration object and returns typed RoutewiseConfig.
 */
export function validateConfig(config: unknown): {
  success: true;
  data: RoutewiseConfig;
} | {
  success: false;
  error: z.ZodError;
} {
  const result = RoutewiseConfigSchema.safeParse(config);
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: result.error };
}

/**
 * Merges user configuration with defaults, ensuring all required fields are present.
 */
export function mergeWithDefaults(userConfig: RoutewiseConfigInput): RoutewiseConfig {
  return RoutewiseConfigSchema.parse(userConfig);
}
