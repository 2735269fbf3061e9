/**
 * ALMANAC ORCHESTRATOR
 *
 * Runs the planning pipeline in order:
 * 1. Validate the request
 * 2. CheckFeasibility (early return if the task cannot happen there)
 * 3. ClassifyActivity
 * 4. Forecast window + ScoreWeatherRisk (only when weather is relevant)
 * 5. GeneratePlans (LLM with deterministic fallback)
 * 6. Schedule adjustment of Plan B (shifts + buffers)
 * 7. Assemble and validate the PlanResponse
 *
 * Each skill is logged with timing and fallback usage.
 * LLM usage is tracked in the debug.llm field.
 */

import {
  PlanRequestSchema,
  PlanResponseSchema,
  type AgentError,
  type DecisionPoint,
  type PlanRequest,
  type PlanResponse,
  type RiskAssessment,
  type ScheduleChange,
  type WeatherCondition,
  type WeatherRelevance,
} from "@shared/schema";
import type { SkillContext, SkillResultMeta } from "../skills/types";
import { runSkill } from "../skills/types";
import { checkFeasibilitySkill } from "../skills/checkFeasibility.skill";
import { classifyActivitySkill } from "../skills/classifyActivity.skill";
import { scoreWeatherRiskSkill } from "../skills/scoreWeatherRisk.skill";
import { generatePlansSkill } from "../skills/generatePlans.skill";
import { adjustSchedule, type ConditionsByDate } from "../schedule";
import { formatWeatherSummary } from "../risk";
import type { DebugOutput, OrchestratorOutput, SkillRunDebug } from "./schemas";

// ============================================
// ORCHESTRATOR CONTEXT BUILDER
// ============================================

export interface OrchestratorConfig {
  debugMode?: boolean;
  useLLM?: boolean;
  simulationMode?: boolean;
}

/**
 * Create a skill context with the necessary dependencies
 */
export function createSkillContext(
  config: OrchestratorConfig,
  deps: {
    getForecast: SkillContext["getForecast"];
    llm: SkillContext["llm"];
    now?: Date;
  }
): SkillContext {
  return {
    logger: {
      info: (msg, data) => config.debugMode && console.log(`[INFO] ${msg}`, data || ""),
      warn: (msg, data) => console.warn(`[WARN] ${msg}`, data || ""),
      error: (msg, data) => console.error(`[ERROR] ${msg}`, data || ""),
      debug: (msg, data) => config.debugMode && console.log(`[DEBUG] ${msg}`, data || ""),
    },
    now: deps.now ?? new Date(),
    timezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
    getForecast: deps.getForecast,
    llm: deps.llm,
    flags: {
      debugMode: config.debugMode || false,
      useLLM: config.useLLM ?? true,
      simulationMode: config.simulationMode || false,
    },
  };
}

// ============================================
// SKILL RESULT COLLECTOR
// ============================================

function metaToDebugFormat(meta: SkillResultMeta): SkillRunDebug {
  return {
    skillName: meta.skillName,
    startedAt: meta.startedAt.toISOString(),
    endedAt: meta.endedAt.toISOString(),
    durationMs: meta.durationMs,
    ok: meta.ok,
    usedFallback: meta.usedFallback,
    error: meta.error,
    notes: meta.notes,
  };
}

// ============================================
// DECISION HELPERS
// ============================================

const CHANGE_DECISIONS: Record<ScheduleChange["kind"], string> = {
  shifted: "Moved a weather-exposed step",
  buffered: "Added a weather buffer",
  deconflicted: "Resolved an overlap",
  buffer_skipped: "Could not fit a buffer",
};

function changeToDecision(change: ScheduleChange, conditions: ConditionsByDate): DecisionPoint {
  const date = (change.from ?? change.to)?.slice(0, 10);
  const day = date ? conditions[date] : undefined;
  return {
    decision: `${CHANGE_DECISIONS[change.kind]} (Plan B, step ${change.stepOrder})`,
    reasoning: change.reason,
    dataUsed: day ? formatWeatherSummary(day.weather) : null,
  };
}

function buildConditions(forecast: WeatherCondition[], assessments: RiskAssessment[]): ConditionsByDate {
  const conditions: ConditionsByDate = {};
  for (const weather of forecast) {
    const assessment = assessments.find((a) => a.date === weather.forecastDate);
    conditions[weather.forecastDate] = {
      weather,
      bufferMinutes: assessment?.bufferMinutes ?? 0,
    };
  }
  return conditions;
}

const NOT_ASSESSED: WeatherRelevance = {
  isRelevant: false,
  sensitivity: "none",
  confidence: 1,
  explanation: "Not assessed: the task is not feasible at this location",
  outdoorActivities: [],
};

const INFEASIBLE_CONFIDENCE = 0.95;

// ============================================
// MAIN ORCHESTRATOR
// ============================================

export async function planItinerary(
  request: PlanRequest,
  ctx: SkillContext
): Promise<OrchestratorOutput> {
  const skillResults: SkillResultMeta[] = [];
  const decisions: DecisionPoint[] = [];
  const orchestratorStartTime = Date.now();

  ctx.llm.resetDebugInfo();

  const buildDebug = (trace?: string): DebugOutput | undefined =>
    ctx.flags.debugMode
      ? {
          skillsRun: skillResults.map(metaToDebugFormat),
          llm: ctx.llm.getDebugInfo(),
          simulationMode: request.simulationMode || ctx.flags.simulationMode,
          trace,
        }
      : undefined;

  // ==========================================
  // STEP 1: Validate request
  // ==========================================
  const parsed = PlanRequestSchema.safeParse(request);
  if (!parsed.success) {
    const error: AgentError = {
      errorType: "ValidationError",
      message: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; "),
      fallbackAvailable: false,
      suggestion: "Check the task, location and dates, then try again.",
    };
    return { type: "error", error, debug: buildDebug() };
  }

  const input = parsed.data;
  const simulate = input.simulationMode || ctx.flags.simulationMode;

  const finish = (
    type: "plan" | "infeasible",
    body: Omit<PlanResponse, "originalRequest" | "location" | "startDate" | "endDate" | "usedFallback" | "generatedAt">
  ): OrchestratorOutput => {
    const response = PlanResponseSchema.parse({
      originalRequest: input.task,
      location: input.location,
      startDate: input.startDate,
      endDate: input.endDate,
      ...body,
      usedFallback: skillResults.some((s) => s.usedFallback),
      generatedAt: ctx.now.toISOString(),
    });

    const totalDurationMs = Date.now() - orchestratorStartTime;
    const llmInfo = ctx.llm.getDebugInfo();
    const trace = `[orchestrator] type=${type} location=${input.location.slice(0, 30)} days=${response.forecast.length} llmCalled=${llmInfo.called} llmValidated=${llmInfo.validated} fallback=${response.usedFallback} durationMs=${totalDurationMs}`;
    ctx.logger.debug(trace);

    return { type, response, debug: buildDebug(trace) };
  };

  try {
    // ==========================================
    // STEP 2: Feasibility gate
    // ==========================================
    const feasibilityResult = await runSkill(checkFeasibilitySkill, ctx, {
      task: input.task,
      location: input.location,
    });
    skillResults.push(feasibilityResult.meta);

    const feasibility = feasibilityResult.output;
    const taskFeasibility = {
      feasible: feasibility.feasible,
      reason: feasibility.reason,
      suggestion: feasibility.suggestion,
    };

    if (!feasibility.feasible) {
      decisions.push({
        decision: "Stopped before planning: task not feasible here",
        reasoning: feasibility.reason,
        dataUsed: feasibility.resolvedPlace ? `Known place: ${feasibility.resolvedPlace}` : null,
      });
      return finish("infeasible", {
        taskFeasibility,
        weatherRelevance: NOT_ASSESSED,
        forecast: [],
        riskAssessments: [],
        planA: null,
        planB: null,
        decisionTrace: decisions,
        scheduleChanges: [],
        agentConfidence: INFEASIBLE_CONFIDENCE,
      });
    }

    decisions.push({
      decision: feasibility.verified ? "Location check passed" : "Location not in the geography table",
      reasoning: feasibility.reason,
      dataUsed: feasibility.resolvedPlace ? `Known place: ${feasibility.resolvedPlace}` : null,
    });

    // ==========================================
    // STEP 3: Weather relevance
    // ==========================================
    const relevanceResult = await runSkill(classifyActivitySkill, ctx, { text: input.task });
    skillResults.push(relevanceResult.meta);
    const relevance = relevanceResult.output;

    // ==========================================
    // STEP 4: Forecast + risk (only when relevant)
    // ==========================================
    let forecast: WeatherCondition[] = [];
    let assessments: RiskAssessment[] = [];
    let overallLevel: RiskAssessment["level"] = "low";

    if (relevance.isRelevant) {
      forecast = await ctx.getForecast(input.location, input.startDate, input.endDate, { simulate });

      const riskResult = await runSkill(scoreWeatherRiskSkill, ctx, { forecast });
      skillResults.push(riskResult.meta);
      assessments = riskResult.output.assessments;
      overallLevel = riskResult.output.overallLevel;

      decisions.push({
        decision: "Fetched weather data",
        reasoning: relevance.explanation,
        dataUsed: forecast.map((w) => `${w.forecastDate}: ${formatWeatherSummary(w)}`).join("; ") || null,
      });

      const estimated = forecast.filter((w) => w.isSimulated).map((w) => w.forecastDate);
      if (estimated.length > 0) {
        decisions.push({
          decision: "Used estimated weather",
          reasoning: simulate
            ? "Simulation mode is on"
            : "No live forecast was available for these dates",
          dataUsed: estimated.join(", "),
        });
      }

      decisions.push({
        decision: `Assessed overall weather risk as ${overallLevel}`,
        reasoning: assessments.map((a) => `${a.date}: ${a.explanation}`).join(" ") || "No forecast days",
        dataUsed: `Largest buffer: ${riskResult.output.maxBufferMinutes} min`,
      });
    } else {
      decisions.push({
        decision: "Skipped weather lookup",
        reasoning: relevance.explanation,
        dataUsed: null,
      });
    }

    // ==========================================
    // STEP 5: Generate plans
    // ==========================================
    const plansResult = await runSkill(generatePlansSkill, ctx, {
      task: input.task,
      location: input.location,
      startDate: input.startDate,
      endDate: input.endDate,
      relevance,
      forecast,
      assessments,
      overallLevel,
    });
    skillResults.push(plansResult.meta);
    const plans = plansResult.output.plans;

    if (!plans.taskFeasibility.feasible) {
      return finish("infeasible", {
        taskFeasibility: plans.taskFeasibility,
        weatherRelevance: relevance,
        forecast,
        riskAssessments: assessments,
        planA: null,
        planB: null,
        decisionTrace: [...decisions, ...plans.decisionTrace],
        scheduleChanges: [],
        agentConfidence: plans.agentConfidence,
      });
    }

    // ==========================================
    // STEP 6: Adjust Plan B around the weather
    // ==========================================
    let planB = plans.planB;
    let scheduleChanges: ScheduleChange[] = [];
    if (planB) {
      const conditions = buildConditions(forecast, assessments);
      const adjusted = adjustSchedule(planB, conditions);
      planB = adjusted.plan;
      scheduleChanges = adjusted.changes;
      decisions.push(...scheduleChanges.map((change) => changeToDecision(change, conditions)));
    }

    // ==========================================
    // STEP 7: Assemble
    // ==========================================
    return finish("plan", {
      taskFeasibility: plans.taskFeasibility,
      weatherRelevance: relevance,
      forecast,
      riskAssessments: assessments,
      planA: plans.planA,
      planB,
      decisionTrace: [...decisions, ...plans.decisionTrace],
      scheduleChanges,
      agentConfidence: plans.agentConfidence,
    });
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : "Unknown error";
    ctx.logger.error(`[orchestrator] Planning failed: ${errorMsg}`);
    return {
      type: "error",
      error: {
        errorType: error instanceof Error ? error.name : "UnknownError",
        message: errorMsg,
        fallbackAvailable: true,
        suggestion: "Try simplifying your request or check your API configuration.",
      },
      debug: buildDebug(),
    };
  }
}
