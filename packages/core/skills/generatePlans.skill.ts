/**
 * GENERATE PLANS SKILL
 *
 * Produces Plan A (as requested) and Plan B (weather-adjusted).
 *
 * LLM: Gemini writes both plans from the request, relevance and per-day
 * risk; its output goes through the response validator.
 * DETERMINISTIC FALLBACK: one generic step per day (Plan B adds a forecast
 * check first) whenever the model is disabled, unavailable, fails, or its
 * output is rejected.
 */

import { z } from "zod";
import {
  ModelPlanOutputSchema,
  RiskAssessmentSchema,
  RiskLevelSchema,
  WeatherConditionSchema,
  WeatherRelevanceSchema,
  type ModelPlanOutput,
  type PlanOption,
  type RiskLevel,
  type TaskStep,
} from "@shared/schema";
import type { Skill } from "./types";
import { enumerateDates, formatLocalDateTime } from "../schedule";
import { ResponseValidationError, validateModelOutput } from "../validation";
import { buildPlanPrompt, PLANNER_SYSTEM_INSTRUCTION } from "./planPrompts";

// ============================================
// SCHEMAS
// ============================================

const GeneratePlansInputSchema = z.object({
  task: z.string().min(1),
  location: z.string().min(1),
  startDate: z.string(),
  endDate: z.string(),
  relevance: WeatherRelevanceSchema,
  forecast: z.array(WeatherConditionSchema),
  assessments: z.array(RiskAssessmentSchema),
  overallLevel: RiskLevelSchema,
});

const GeneratePlansOutputSchema = z.object({
  plans: ModelPlanOutputSchema,
  usedLLM: z.boolean(),
  validationNotes: z.array(z.string()),
});

export type GeneratePlansInput = z.infer<typeof GeneratePlansInputSchema>;
export type GeneratePlansOutput = z.infer<typeof GeneratePlansOutputSchema>;

const MODEL_TEMPERATURE = 0.4;
const FALLBACK_CONFIDENCE = 0.3;

const DAY_START = 9 * 60;
const DAY_END = 17 * 60;
const CHECK_START = 8 * 60;
const CHECK_END = 8 * 60 + 30;

// ============================================
// DETERMINISTIC FALLBACK
// ============================================

export function buildFallbackPlans(input: GeneratePlansInput, reason: string): ModelPlanOutput {
  const dates = enumerateDates(input.startDate, input.endDate);
  const hasForecast = input.forecast.length > 0;
  const planARisk: RiskLevel = hasForecast ? input.overallLevel : "medium";
  const planBRisk: RiskLevel = input.overallLevel === "critical" ? "medium" : "low";
  const sensitive = input.relevance.isRelevant;

  const levelFor = (date: string): RiskLevel =>
    input.assessments.find((a) => a.date === date)?.level ?? planARisk;

  const planASteps: TaskStep[] = dates.map((date, i) => ({
    order: i + 1,
    description: `Proceed with: ${input.task}`,
    timeFrom: formatLocalDateTime(date, DAY_START),
    timeTo: formatLocalDateTime(date, DAY_END),
    location: input.location,
    weatherSensitive: sensitive,
    riskNote: `Weather risk: ${levelFor(date)}`,
  }));

  const planBSteps: TaskStep[] = dates.flatMap((date, i) => [
    {
      order: i * 2 + 1,
      description: "Check the forecast before heading out",
      timeFrom: formatLocalDateTime(date, CHECK_START),
      timeTo: formatLocalDateTime(date, CHECK_END),
      location: null,
      weatherSensitive: false,
      riskNote: null,
    },
    {
      order: i * 2 + 2,
      description: input.task,
      timeFrom: formatLocalDateTime(date, DAY_START),
      timeTo: formatLocalDateTime(date, DAY_END),
      location: input.location,
      weatherSensitive: sensitive,
      riskNote: "Have a backup plan ready",
    },
  ]);

  const recommendA = planARisk === "low";

  const planA: PlanOption = {
    name: "Original Plan",
    summary: `Carry out the plan in ${input.location} as requested.`,
    steps: planASteps,
    overallRisk: planARisk,
    riskExplanation: hasForecast
      ? input.assessments.map((a) => `${a.date}: ${a.explanation}`).join(" ")
      : "No forecast was used for this plan.",
    recommended: recommendA,
  };

  const planB: PlanOption = {
    name: "Weather-Safe Plan",
    summary: "Check conditions each morning and keep a backup option ready.",
    steps: planBSteps,
    overallRisk: planBRisk,
    riskExplanation: "A morning forecast check and a backup option limit weather exposure.",
    recommended: !recommendA,
  };

  return {
    taskFeasibility: {
      feasible: true,
      reason: "Feasibility was not evaluated by the model; the location check found no conflict.",
      suggestion: null,
    },
    planA,
    planB,
    decisionTrace: [
      {
        decision: "Used deterministic fallback plans",
        reasoning: reason,
        dataUsed: hasForecast ? `Overall weather risk: ${input.overallLevel}` : null,
      },
    ],
    agentConfidence: FALLBACK_CONFIDENCE,
  };
}

// ============================================
// SKILL DEFINITION
// ============================================

export const generatePlansSkill: Skill<GeneratePlansInput, GeneratePlansOutput> = {
  name: "generatePlans",

  inputSchema: GeneratePlansInputSchema,
  outputSchema: GeneratePlansOutputSchema,

  async run(ctx, input) {
    const notes: string[] = [];

    if (!ctx.flags.useLLM || !ctx.llm.isAvailable()) {
      const reason = !ctx.flags.useLLM
        ? "LLM planning is disabled"
        : "LLM is not available (API key not configured)";
      notes.push(reason);
      return {
        output: { plans: buildFallbackPlans(input, reason), usedLLM: false, validationNotes: [] },
        meta: { ok: true, usedFallback: true, notes },
      };
    }

    try {
      const prompt = buildPlanPrompt(input);
      const raw = await ctx.llm.generate(prompt, ModelPlanOutputSchema, {
        systemInstruction: PLANNER_SYSTEM_INSTRUCTION,
        temperature: MODEL_TEMPERATURE,
        json: true,
      });

      const result = validateModelOutput(raw, {
        startDate: input.startDate,
        endDate: input.endDate,
      });
      if (!result.ok) {
        throw new ResponseValidationError("Model response failed validation", result.issues);
      }

      notes.push(...result.notes);
      return {
        output: { plans: result.value, usedLLM: true, validationNotes: result.notes },
        meta: { ok: true, usedFallback: false, notes },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      ctx.logger.warn(`[generatePlans] Model plans rejected, using fallback: ${message}`);
      notes.push(`Model failed (${message}), using fallback`);
      return {
        output: {
          plans: buildFallbackPlans(input, `The model response could not be used: ${message}`),
          usedLLM: false,
          validationNotes: [],
        },
        meta: { ok: false, usedFallback: true, notes, error: message },
      };
    }
  },

  fallback(input) {
    return {
      plans: buildFallbackPlans(input, "Plan generation failed"),
      usedLLM: false,
      validationNotes: [],
    };
  },
};
