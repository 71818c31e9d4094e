import { z } from "zod";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const ServerEnvSchema = z.object({
  // OpenAI (optional: without a key the engine runs its deterministic fallbacks)
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  MODEL_TIMEOUT_MS: intFromEnv(20_000),

  // Supabase (server)
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  FILL_STORAGE_BUCKET: z.string().min(1).default("fill-templates"),
  STORE_DRIVER: z.enum(["memory", "supabase"]).default("memory"),

  // App
  PORT: intFromEnv(8080),
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

/** Parse an env record. Throws with a flattened field report on failure. */
export function parseServerEnv(source: Record<string, string | undefined>): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }

  const env = parsed.data;
  if (env.STORE_DRIVER === "supabase" && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error("STORE_DRIVER=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.");
  }
  return env;
}

let _env: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (_env) return _env;
  _env = parseServerEnv(process.env);
  return _env;
}
