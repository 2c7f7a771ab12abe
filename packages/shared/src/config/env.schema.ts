import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) =>
      value === undefined ? fallback : value === "true" || value === "1",
    );

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

// Empty values, as in a copied .env template, count as unset
const optionalString = () =>
  z
    .string()
    .optional()
    .transform((value) => value || undefined);

const count = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/**
 * Environment accepted by every deskpilot package. Values arrive as strings
 * and leave as typed, defaulted settings.
 */
export const deskpilotEnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "debug", "verbose"])
    .default("info"),
  LOG_DIR: z.string().min(1).default("logs"),

  LLM_PROVIDER: z.enum(["anthropic", "openai", "google"]).default("anthropic"),
  LLM_MODEL: optionalString(),
  LLM_MAX_TOKENS: count(1024),
  ANTHROPIC_API_KEY: optionalString(),
  OPENAI_API_KEY: optionalString(),
  GEMINI_API_KEY: optionalString(),
  DEBUG_FULL_PROMPTS: flag(false),

  OMNIPARSER_ENABLED: flag(true),
  OMNIPARSER_URL: z.string().url().default("http://localhost:9989"),
  OMNIPARSER_TIMEOUT_MS: count(30000),
  OMNIPARSER_DOWNSAMPLE_FACTOR: z.coerce.number().gt(0).lte(1).default(1),
  OMNIPARSER_MIN_ELEMENT_PX: nonNegativeInt(3),
  OMNIPARSER_INCLUDE_CAPTIONS: flag(true),

  AGENT_MAX_STEPS: count(10),
  AGENT_MAX_CONSECUTIVE_FAILURES: count(3),
  AGENT_STEP_DELAY_MS: nonNegativeInt(1500),
  PERCEPTION_TIMEOUT_MS: count(45000),
  PERCEPTION_MAX_RETRIES: nonNegativeInt(3),
  PERCEPTION_RETRY_BACKOFF_MS: nonNegativeInt(1000),
  PLANNING_TIMEOUT_MS: count(60000),
  PLANNER_HISTORY_WINDOW: nonNegativeInt(10),
  PLANNER_MAX_ELEMENTS: count(100),

  DISPLAY_SCALE_FACTOR: z.coerce.number().positive().optional(),
  VERIFICATION_ENABLED: flag(true),
  VERIFICATION_SETTLE_MS: nonNegativeInt(500),
  VERIFICATION_DIFF_THRESHOLD: z.coerce.number().positive().default(4),

  RUN_OUTPUT_DIR: z.string().min(1).default("runs"),
  RUN_ARTIFACTS_ENABLED: flag(true),
});

export type DeskpilotEnv = z.infer<typeof deskpilotEnvSchema>;

/**
 * `validate` hook for ConfigModule.forRoot. Throws with every issue listed.
 */
export function validateEnv(config: Record<string, unknown>): DeskpilotEnv {
  const result = deskpilotEnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid deskpilot configuration: ${issues}`);
  }
  return result.data;
}
