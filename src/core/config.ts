import { z } from "zod";

export const DEFAULT_API_URL = "http://localhost:9380";
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface RagflowConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  RAGFLOW_API_KEY: z
    .string({ required_error: "RAGFLOW_API_KEY is not set" })
    .trim()
    .min(1, "RAGFLOW_API_KEY is empty"),
  RAGFLOW_API_URL: z
    .string()
    .trim()
    .url("RAGFLOW_API_URL must be a URL")
    .refine((u) => /^https?:\/\//i.test(u), "RAGFLOW_API_URL must start with http:// or https://")
    .optional(),
  RAGFLOW_TIMEOUT_MS: z
    .string()
    .trim()
    .regex(/^\d+$/, "RAGFLOW_TIMEOUT_MS must be a positive integer")
    .transform(Number)
    .refine((n) => n > 0, "RAGFLOW_TIMEOUT_MS must be a positive integer")
    .optional(),
});

/**
 * Build the client configuration from an environment map.
 * Empty strings count as unset for the optional variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv): RagflowConfig {
  const result = envSchema.safeParse({
    RAGFLOW_API_KEY: env.RAGFLOW_API_KEY,
    RAGFLOW_API_URL: env.RAGFLOW_API_URL || undefined,
    RAGFLOW_TIMEOUT_MS: env.RAGFLOW_TIMEOUT_MS || undefined,
  });

  if (!result.success) {
    const issues = new Set(result.error.issues.map((i) => i.message));
    throw new ConfigError(`Invalid configuration: ${[...issues].join("; ")}`);
  }

  return {
    apiKey: result.data.RAGFLOW_API_KEY,
    baseUrl: result.data.RAGFLOW_API_URL ?? DEFAULT_API_URL,
    timeoutMs: result.data.RAGFLOW_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}
