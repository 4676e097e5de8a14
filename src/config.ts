import { z } from "zod";

export const DEFAULT_BASE_URL = "https://maps.googleapis.com/maps/api/place/textsearch/json";

// $17 per 1000 text-search requests
export const DEFAULT_PRICE_PER_REQUEST = 0.017;

export const TesterConfigSchema = z.object({
  apiKey: z.string().min(1, "PLACES_API_KEY is required"),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  workerCount: z.coerce.number().int().positive().default(50),
  concurrencyMode: z.enum(["bounded_parallel", "cooperative"]).default("bounded_parallel"),
  poolSize: z.coerce.number().int().positive().default(50),
  timeoutSeconds: z.coerce.number().positive().default(30),
  pricePerRequest: z.coerce.number().nonnegative().default(DEFAULT_PRICE_PER_REQUEST),
  outputDir: z.string().min(1).default("data/out"),
  saveReport: z.boolean().default(true),
  csv: z.boolean().default(false),
});

export type TesterConfig = z.infer<typeof TesterConfigSchema>;

// Values as read from the environment or argv, before coercion
export type ConfigSource = Partial<Record<keyof TesterConfig, unknown>>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigSource {
  return {
    apiKey: env.PLACES_API_KEY ?? "",
    baseUrl: env.PLACES_BASE_URL || undefined,
    workerCount: env.LOAD_WORKERS || undefined,
    poolSize: env.LOAD_POOL_SIZE || undefined,
    timeoutSeconds: env.LOAD_TIMEOUT_SECONDS || undefined,
    pricePerRequest: env.LOAD_PRICE_PER_REQUEST || undefined,
    outputDir: env.LOAD_OUTPUT_DIR || undefined,
  };
}

/** Later sources win; `undefined` never overrides an earlier value. */
export function resolveConfig(...sources: ConfigSource[]): TesterConfig {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [k, v] of Object.entries(source)) {
      if (v !== undefined) merged[k] = v;
    }
  }

  const parsed = TesterConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const { fieldErrors, formErrors } = parsed.error.flatten();
    const issues = [
      ...formErrors,
      ...Object.entries(fieldErrors).map(([field, messages]) => `${field}: ${(messages ?? []).join(", ")}`),
    ];
    throw new ConfigError(issues);
  }
  return parsed.data;
}
