/**
 * ALMANAC SKILL SYSTEM — TYPE DEFINITIONS
 *
 * A skill is a small, testable, deterministic module with:
 * - Clear input/output contract (Zod validated)
 * - Fallback behavior when external calls fail
 * - Instrumentation for debugging
 */

import { z } from "zod";
import type { WeatherCondition } from "@shared/schema";

// ============================================
// SKILL CONTEXT — shared dependencies
// ============================================

export interface SkillLogger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
}

export interface LLMDebugInfo {
  called: boolean;
  provider: "gemini" | "none";
  model?: string;
  latencyMs?: number;
  validated: boolean;
  fallbackReason?: string;
  rawPreview?: string;
  inputTokensEstimate?: number;
}

export interface GenerateOptions {
  /** Sent as the model's system instruction rather than inside the prompt */
  systemInstruction?: string;
  temperature?: number;
  /** Ask the provider for a JSON response body */
  json?: boolean;
}

/** A schema whose parsed output is T, whatever it accepts as input. */
export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface LLMClient {
  /**
   * Generate text completion with JSON schema validation
   * @param prompt The prompt to send
   * @param schema Optional Zod schema for structured output
   * @returns The generated text or parsed JSON
   */
  generate<T = string>(prompt: string, schema?: OutputSchema<T>, options?: GenerateOptions): Promise<T>;

  /**
   * Check if LLM is available
   */
  isAvailable(): boolean;

  /**
   * Get debug info about last LLM call
   */
  getDebugInfo(): LLMDebugInfo;

  /**
   * Reset debug info for new request
   */
  resetDebugInfo(): void;
}

export interface ForecastOptions {
  simulate?: boolean;
}

export interface SkillContext {
  // Logging
  logger: SkillLogger;

  // Time context
  now: Date;
  timezone: string;

  // Weather resolver (one entry per date, inclusive)
  getForecast: (
    location: string,
    startDate: string,
    endDate: string,
    options?: ForecastOptions
  ) => Promise<WeatherCondition[]>;

  // LLM client (plan generation; every decision has a deterministic fallback)
  llm: LLMClient;

  // Feature flags
  flags: {
    debugMode: boolean;
    useLLM: boolean;
    simulationMode: boolean;
  };
}

// ============================================
// SKILL RESULT METADATA — instrumentation
// ============================================

export interface SkillResultMeta {
  skillName: string;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  ok: boolean;
  usedFallback: boolean;
  error?: string;
  notes?: string[];
}

// ============================================
// SKILL INTERFACE
// ============================================

/** What a skill reports about its own run; the runner adds name and timing */
export type SkillOutcome = Omit<SkillResultMeta, "skillName" | "startedAt" | "endedAt" | "durationMs">;

export interface SkillOutput<TOutput> {
  output: TOutput;
  meta: SkillOutcome;
}

export interface Skill<TInput, TOutput> {
  name: string;
  inputSchema: OutputSchema<TInput>;
  outputSchema: OutputSchema<TOutput>;

  /** Receives input that already passed `inputSchema` */
  run(ctx: SkillContext, input: TInput): Promise<SkillOutput<TOutput>>;

  /**
   * Deterministic answer used when validation or `run` fails.
   * Without one, the runner rethrows.
   */
  fallback?: (input: TInput) => TOutput;
}

// ============================================
// SKILL RUNNER
// ============================================

export interface SkillRunResult<TOutput> {
  output: TOutput;
  meta: SkillResultMeta;
}

interface SkillFailure {
  /** Recorded as `meta.error` and logged */
  reason: string;
  note: string;
  /** Rethrown when the skill has no fallback */
  cause: unknown;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Validates input, runs the skill, validates its output and stamps timing.
 * Any failure along the way resolves to the skill's fallback when it has one.
 */
export async function runSkill<TInput, TOutput>(
  skill: Skill<TInput, TOutput>,
  ctx: SkillContext,
  rawInput: TInput
): Promise<SkillRunResult<TOutput>> {
  const tag = `[${skill.name}]`;
  const startedAt = new Date();

  const settle = (output: TOutput, outcome: SkillOutcome): SkillRunResult<TOutput> => {
    const endedAt = new Date();
    return {
      output,
      meta: {
        skillName: skill.name,
        startedAt,
        endedAt,
        durationMs: endedAt.getTime() - startedAt.getTime(),
        ...outcome,
      },
    };
  };

  const recover = (fallbackInput: TInput, failure: SkillFailure): SkillRunResult<TOutput> => {
    if (!skill.fallback) {
      ctx.logger.error(`${tag} ${failure.reason}`);
      throw failure.cause;
    }
    ctx.logger.error(`${tag} ${failure.reason}; answering with fallback`);
    return settle(skill.fallback(fallbackInput), {
      ok: false,
      usedFallback: true,
      notes: [failure.note],
      error: failure.reason,
    });
  };

  const input = skill.inputSchema.safeParse(rawInput);
  if (!input.success) {
    const reason = `Input validation failed: ${input.error.message}`;
    return recover(rawInput, {
      reason,
      note: "Input validation failed, using fallback",
      cause: new Error(reason),
    });
  }

  let produced: SkillOutput<TOutput>;
  try {
    ctx.logger.debug(`${tag} Starting execution`);
    produced = await skill.run(ctx, input.data);
  } catch (error) {
    const reason = errorMessage(error);
    return recover(input.data, {
      reason,
      note: `Execution failed (${reason}), using fallback`,
      cause: error,
    });
  }

  const output = skill.outputSchema.safeParse(produced.output);
  if (!output.success) {
    const reason = `Output validation failed: ${output.error.message}`;
    return recover(input.data, {
      reason,
      note: "Output validation failed, using fallback",
      cause: new Error(reason),
    });
  }

  const { ok, usedFallback, notes, error } = produced.meta;
  ctx.logger.debug(`${tag} Completed`, { usedFallback });
  return settle(output.data, {
    ok,
    usedFallback,
    notes: notes && notes.length > 0 ? notes : undefined,
    error,
  });
}
