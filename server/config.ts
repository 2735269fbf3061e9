import { z } from "zod";
import { DEFAULT_GEMINI_BASE_URL, DEFAULT_GEMINI_MODEL } from "../packages/core/llm";

// ── Environment parsing ─────────────────────────────────────────────

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off", ""];

const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = (value ?? "").trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected one of ${[...TRUE_VALUES, ...FALSE_VALUES.filter(Boolean)].join("/")}`,
    });
    return z.NEVER;
  });

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a positive integer" });
        return z.NEVER;
      }
      return parsed;
    });

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  GEMINI_BASE_URL: optionalText.pipe(z.string().url().optional()),
  SIMULATION_MODE: booleanFlag,
  WEATHER_API_URL: optionalText.pipe(z.string().url().optional()),
  WEATHER_CACHE_TTL_MINUTES: positiveInt(30),
  WEATHER_TIMEOUT_MS: positiveInt(10_000),
  PORT: positiveInt(5001).pipe(z.number().max(65535)),
  DEBUG_MODE: booleanFlag,
});

export interface AppConfig {
  gemini: {
    apiKey?: string;
    model: string;
    baseUrl: string;
  };
  weather: {
    baseUrl: string;
    cacheTtlMinutes: number;
    timeoutMs: number;
  };
  simulationMode: boolean;
  debugMode: boolean;
  port: number;
}

export const DEFAULT_WEATHER_API_URL = "https://wttr.in";

/**
 * Parse the environment into typed settings.
 * Throws one Error naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `   - ${issue.path.join(".")}: ${issue.message}`
    );
    throw new Error(`Invalid environment configuration:\n${problems.join("\n")}`);
  }

  const parsed = result.data;
  return {
    gemini: {
      apiKey: parsed.GEMINI_API_KEY ?? parsed.GOOGLE_API_KEY,
      model: parsed.GEMINI_MODEL ?? DEFAULT_GEMINI_MODEL,
      baseUrl: parsed.GEMINI_BASE_URL ?? DEFAULT_GEMINI_BASE_URL,
    },
    weather: {
      baseUrl: parsed.WEATHER_API_URL ?? DEFAULT_WEATHER_API_URL,
      cacheTtlMinutes: parsed.WEATHER_CACHE_TTL_MINUTES,
      timeoutMs: parsed.WEATHER_TIMEOUT_MS,
    },
    simulationMode: parsed.SIMULATION_MODE,
    debugMode: parsed.DEBUG_MODE,
    port: parsed.PORT,
  };
}
