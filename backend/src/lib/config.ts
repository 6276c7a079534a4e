import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenvConfig();

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => (v ? ["1", "true", "yes", "on"].includes(v.trim().toLowerCase()) : false));

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().positive().default(4000),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  logPretty: booleanFlag,

  // Output
  outputDir: z.string().min(1).default("outputs"),
  enableGraphVisualization: booleanFlag,
  graphOutputFormat: z.enum(["svg", "dot"]).default("svg"),

  // Analysis
  maxTraceNesting: z.coerce.number().int().positive().max(1024).default(50),
  centralNodeLimit: z.coerce.number().int().positive().default(5),

  // Ethereum RPC
  rpcUrlDefault: z.string().url().optional()
});

export type Config = Omit<z.infer<typeof configSchema>, "logLevel"> & {
  logLevel: NonNullable<z.infer<typeof configSchema>["logLevel"]>;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV || undefined,
    port: env.PORT || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    logPretty: env.LOG_PRETTY,
    outputDir: env.OUTPUT_DIR || undefined,
    enableGraphVisualization: env.ENABLE_GRAPH_VISUALIZATION,
    graphOutputFormat: env.GRAPH_OUTPUT_FORMAT?.toLowerCase() || undefined,
    maxTraceNesting: env.MAX_TRACE_NESTING || undefined,
    centralNodeLimit: env.CENTRAL_NODE_LIMIT || undefined,
    rpcUrlDefault: env.RPC_URL_DEFAULT || undefined
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join("; ")})`, issues);
  }

  const data = result.data;
  return {
    ...data,
    logLevel: data.logLevel ?? (data.nodeEnv === "test" ? "silent" : "info")
  };
}

export const config = loadConfig();
