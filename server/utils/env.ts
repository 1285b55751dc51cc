import { z } from "zod";
import { SUPPORTED_VOICES } from "./twiml-helper";

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === "true"));

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  CLINIC_CONFIG_PATH: z.string().default("server/data/clinic.json"),

  // Language-model backend (optional: keyword extraction is used without it)
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().url().or(z.literal("")).default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),

  // Dialogue policy
  DIALOGUE_RETRY_BUDGET: z.coerce.number().int().min(1).default(3),
  CALL_INACTIVITY_TIMEOUT_MINUTES: z.coerce.number().positive().default(10),
  TURN_HISTORY_LIMIT: z.coerce.number().int().min(1).default(20),
  SEARCH_HORIZON_DAYS: z.coerce.number().int().min(1).max(90).default(14),

  // Twilio
  TWILIO_AUTH_TOKEN: z.string().default(""),
  DISABLE_TWILIO_VALIDATION: flag(false),
  PRIMARY_VOICE: z.enum(SUPPORTED_VOICES).default("Polly.Joanna-Neural"),
  PUBLIC_BASE_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}

export const env = parseEnv(process.env);
