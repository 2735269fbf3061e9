/**
 * ORCHESTRATOR SCHEMAS
 *
 * Output types for the planning pipeline.
 */

import { z } from "zod";
import { AgentErrorSchema, PlanResponseSchema } from "@shared/schema";

// ============================================
// LLM DEBUG INFO
// ============================================

export const LLMDebugInfoSchema = z.object({
  called: z.boolean(),
  provider: z.enum(["gemini", "none"]),
  model: z.string().optional(),
  latencyMs: z.number().optional(),
  validated: z.boolean(),
  fallbackReason: z.string().optional(),
  rawPreview: z.string().optional(),
  inputTokensEstimate: z.number().optional(),
});

// ============================================
// DEBUG OUTPUT
// ============================================

export const SkillRunDebugSchema = z.object({
  skillName: z.string(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
  ok: z.boolean(),
  usedFallback: z.boolean(),
  error: z.string().optional(),
  notes: z.array(z.string()).optional(),
});

export type SkillRunDebug = z.infer<typeof SkillRunDebugSchema>;

export const DebugOutputSchema = z.object({
  skillsRun: z.array(SkillRunDebugSchema),
  llm: LLMDebugInfoSchema.optional(),
  simulationMode: z.boolean().optional(),
  trace: z.string().optional(), // Single-line orchestrator trace
});

export type DebugOutput = z.infer<typeof DebugOutputSchema>;

// ============================================
// ORCHESTRATOR OUTPUT
// ============================================

export const OrchestratorOutputSchema = z.discriminatedUnion("type", [
  // Plans generated
  z.object({
    type: z.literal("plan"),
    response: PlanResponseSchema,
    debug: DebugOutputSchema.optional(),
  }),

  // Task rejected by the feasibility gate or the model
  z.object({
    type: z.literal("infeasible"),
    response: PlanResponseSchema,
    debug: DebugOutputSchema.optional(),
  }),

  // Error case
  z.object({
    type: z.literal("error"),
    error: AgentErrorSchema,
    debug: DebugOutputSchema.optional(),
  }),
]);

export type OrchestratorOutput = z.infer<typeof OrchestratorOutputSchema>;
