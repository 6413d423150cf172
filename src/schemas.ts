import { z } from "zod";
import { MAX_TIMEOUT_SECONDS } from "./engine/timeout.js";
import { ConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Provider messages API
// ---------------------------------------------------------------------------

export const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const MessageResponseSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    role: z.string().optional(),
    content: z.array(ContentBlockSchema),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Config file (config/orchestra.json)
// ---------------------------------------------------------------------------

const BackendModeNameSchema = z.string().min(1);

const TimeoutSecondsSchema = z.number().int().positive().max(MAX_TIMEOUT_SECONDS);

export const AgentGroupConfigSchema = z.object({
  enabled: z.boolean().default(true),
  timeoutSeconds: TimeoutSecondsSchema,
  /** Per-group backend override; inherits the global mode when absent. */
  clientMode: BackendModeNameSchema.optional(),
  systemPrompt: z.string().optional(),
});

export const TeammateSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  timeoutSeconds: TimeoutSecondsSchema.default(300),
});

export const TeamDefinitionSchema = z.object({
  description: z.string(),
  teammates: z.array(TeammateSchema).min(1),
});

export const OutputFormatSchema = z.enum(["json", "txt"]);

export const FileConfigSchema = z.object({
  orchestra: z
    .object({
      name: z.string().default("Agent Orchestra"),
      version: z.string().default("1.0.0"),
      defaultMode: z.string().default("auto"),
    })
    .default({}),
  client: z
    .object({
      defaultMode: BackendModeNameSchema.default("claude-code"),
    })
    .default({}),
  agents: z
    .object({
      monitor: AgentGroupConfigSchema.default({ timeoutSeconds: 120 }),
      analyzer: AgentGroupConfigSchema.default({ timeoutSeconds: 180 }),
      researcher: AgentGroupConfigSchema.default({ timeoutSeconds: 300 }),
      reporter: AgentGroupConfigSchema.default({ timeoutSeconds: 120 }),
    })
    .default({}),
  outputs: z
    .object({
      directory: z.string().default("outputs"),
      retentionDays: z.number().int().nonnegative().default(30),
      formats: z.array(OutputFormatSchema).default(["json", "txt"]),
    })
    .default({}),
  logging: z
    .object({
      level: z.string().default("INFO"),
      format: z.enum(["text", "json"]).default("json"),
    })
    .default({}),
  features: z
    .object({
      parallelExecution: z.boolean().default(false),
    })
    .default({}),
  teams: z
    .object({
      enabled: z.boolean().default(false),
      definitions: z.record(TeamDefinitionSchema).default({}),
    })
    .default({}),
  backend: z
    .object({
      apiUrl: z.string().url().optional(),
      model: z.string().optional(),
      maxTokens: z.number().int().positive().optional(),
      subprocessPath: z.string().optional(),
    })
    .default({}),
  storage: z
    .object({
      database: z.string().optional(),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;
export type AgentGroupConfig = z.infer<typeof AgentGroupConfigSchema>;
export type TeamDefinition = z.infer<typeof TeamDefinitionSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/** Parse a config object, throwing a ConfigError that lists every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid ${what}: ${msg}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Stored results
// ---------------------------------------------------------------------------

export const ResultStatusSchema = z.enum(["success", "failed"]);

const StoredResultBase = {
  agentName: z.string(),
  backendLabel: z.string(),
  completedAt: z.string(),
  durationMs: z.number(),
};

export const StoredResultSchema = z.discriminatedUnion("status", [
  z.object({ ...StoredResultBase, status: z.literal("success"), output: z.string() }),
  z.object({ ...StoredResultBase, status: z.literal("failed"), errorMessage: z.string() }),
]);

export const StoredResultsSchema = z.array(StoredResultSchema);
