import { z } from "zod";

// ============================================
// PRIMITIVES
// ============================================

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/;

/** Longest date range a single plan may cover (inclusive). */
export const MAX_PLAN_DAYS = 14;

export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const IsoDateSchema = z
  .string()
  .refine(isCalendarDate, { message: "Expected a calendar date (YYYY-MM-DD)" });

export const LocalDateTimeSchema = z
  .string()
  .regex(LOCAL_DATETIME_PATTERN, "Expected a local datetime (YYYY-MM-DDTHH:MM)");

export const RiskLevelSchema = z.enum(["low", "medium", "high", "critical"]);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const RISK_LEVELS: readonly RiskLevel[] = RiskLevelSchema.options;

export const WeatherSensitivitySchema = z.enum(["none", "low", "high"]);
export type WeatherSensitivity = z.infer<typeof WeatherSensitivitySchema>;

// ============================================
// WEATHER
// ============================================

export const WeatherConditionSchema = z.object({
  temperatureC: z.number(),
  condition: z.string(),
  precipitationChance: z.number().int().min(0).max(100),
  windSpeedKmh: z.number().min(0),
  humidityPercent: z.number().int().min(0).max(100),
  forecastDate: IsoDateSchema,
  location: z.string(),
  isSimulated: z.boolean(),
});

export type WeatherCondition = z.infer<typeof WeatherConditionSchema>;

export const RiskAssessmentSchema = z.object({
  date: IsoDateSchema,
  score: z.number().min(0).max(100),
  level: RiskLevelSchema,
  bufferMinutes: z.number().int().min(0),
  explanation: z.string(),
  summary: z.string(),
});

export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

// ============================================
// PLANS
// ============================================

export const TaskStepSchema = z.object({
  order: z.number().int().min(1),
  description: z.string().min(1),
  timeFrom: LocalDateTimeSchema.nullable().default(null),
  timeTo: LocalDateTimeSchema.nullable().default(null),
  location: z.string().nullable().default(null),
  weatherSensitive: z.boolean().default(false),
  riskNote: z.string().nullable().default(null),
});

export type TaskStep = z.infer<typeof TaskStepSchema>;

export const PlanOptionSchema = z.object({
  name: z.string().min(1),
  summary: z.string(),
  steps: z.array(TaskStepSchema).min(1),
  overallRisk: RiskLevelSchema,
  riskExplanation: z.string(),
  recommended: z.boolean().default(false),
});

export type PlanOption = z.infer<typeof PlanOptionSchema>;

export const DecisionPointSchema = z.object({
  decision: z.string(),
  reasoning: z.string(),
  dataUsed: z.string().nullable().default(null),
});

export type DecisionPoint = z.infer<typeof DecisionPointSchema>;

export const TaskFeasibilitySchema = z.object({
  feasible: z.boolean(),
  reason: z.string(),
  suggestion: z.string().nullable().default(null),
});

export type TaskFeasibility = z.infer<typeof TaskFeasibilitySchema>;

export const WeatherRelevanceSchema = z.object({
  isRelevant: z.boolean(),
  sensitivity: WeatherSensitivitySchema,
  confidence: z.number().min(0).max(1),
  explanation: z.string(),
  outdoorActivities: z.array(z.string()).default([]),
});

export type WeatherRelevance = z.infer<typeof WeatherRelevanceSchema>;

export const ScheduleChangeSchema = z.object({
  stepOrder: z.number().int().min(1),
  kind: z.enum(["shifted", "buffered", "deconflicted", "buffer_skipped"]),
  from: LocalDateTimeSchema.nullable(),
  to: LocalDateTimeSchema.nullable(),
  minutes: z.number().int(),
  reason: z.string(),
});

export type ScheduleChange = z.infer<typeof ScheduleChangeSchema>;

// ============================================
// REQUEST
// ============================================

export const PlanRequestSchema = z
  .object({
    task: z.string().trim().min(1).max(2000),
    location: z.string().trim().min(1).max(200),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
    simulationMode: z.boolean().optional(),
  })
  .superRefine((value, ctx) => {
    if (!isCalendarDate(value.startDate) || !isCalendarDate(value.endDate)) return;
    if (value.endDate < value.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: "End date cannot be before start date",
      });
      return;
    }
    const days =
      (Date.parse(`${value.endDate}T00:00:00Z`) - Date.parse(`${value.startDate}T00:00:00Z`)) /
        86_400_000 +
      1;
    if (days > MAX_PLAN_DAYS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: `Date range cannot exceed ${MAX_PLAN_DAYS} days`,
      });
    }
  });

export type PlanRequest = z.infer<typeof PlanRequestSchema>;

// ============================================
// MODEL OUTPUT — what the LLM must return
// ============================================

export const ModelPlanOutputSchema = z.object({
  taskFeasibility: TaskFeasibilitySchema,
  planA: PlanOptionSchema.nullable().default(null),
  planB: PlanOptionSchema.nullable().default(null),
  decisionTrace: z.array(DecisionPointSchema).default([]),
  agentConfidence: z.number().min(0).max(1),
});

export type ModelPlanOutput = z.infer<typeof ModelPlanOutputSchema>;

// ============================================
// RESPONSE
// ============================================

export const PlanResponseSchema = z
  .object({
    originalRequest: z.string(),
    location: z.string(),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
    taskFeasibility: TaskFeasibilitySchema,
    weatherRelevance: WeatherRelevanceSchema.nullable(),
    forecast: z.array(WeatherConditionSchema),
    riskAssessments: z.array(RiskAssessmentSchema),
    planA: PlanOptionSchema.nullable(),
    planB: PlanOptionSchema.nullable(),
    decisionTrace: z.array(DecisionPointSchema),
    scheduleChanges: z.array(ScheduleChangeSchema),
    agentConfidence: z.number().min(0).max(1),
    usedFallback: z.boolean(),
    generatedAt: z.string(),
  })
  .refine((value) => value.taskFeasibility.feasible || (value.planA === null && value.planB === null), {
    message: "Infeasible responses must not carry plans",
    path: ["taskFeasibility"],
  });

export type PlanResponse = z.infer<typeof PlanResponseSchema>;

export const AgentErrorSchema = z.object({
  errorType: z.string(),
  message: z.string(),
  fallbackAvailable: z.boolean(),
  suggestion: z.string(),
});

export type AgentError = z.infer<typeof AgentErrorSchema>;
