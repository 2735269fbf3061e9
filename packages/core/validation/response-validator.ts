/**
 * RESPONSE VALIDATOR
 *
 * Gatekeeper between the model and the rest of the pipeline. Model output is
 * schema-checked with Zod, then checked against the plan's date window.
 * Hard violations reject the output; small inconsistencies are normalised
 * and reported as notes.
 */

import { ModelPlanOutputSchema, type ModelPlanOutput, type PlanOption } from "@shared/schema";
import { compareRiskLevels } from "../risk";
import { parseLocalDateTime } from "../schedule";

export class ResponseValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ResponseValidationError";
    this.issues = issues;
  }
}

export interface DateWindow {
  startDate: string;
  endDate: string;
}

export type ValidationResult =
  | { ok: true; value: ModelPlanOutput; notes: string[] }
  | { ok: false; issues: string[] };

// ============================================
// JSON EXTRACTION
// ============================================

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

export function extractJsonPayload(text: string): string {
  const trimmed = text.trim();

  const fenced = FENCED_BLOCK.exec(trimmed);
  if (fenced) {
    return fenced[1].trim();
  }

  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first === -1 || last <= first) {
    throw new ResponseValidationError("No JSON object found in model response");
  }
  return trimmed.slice(first, last + 1);
}

// ============================================
// PLAN CHECKS
// ============================================

function checkPlanTimes(label: string, plan: PlanOption, window: DateWindow): string[] {
  const issues: string[] = [];

  for (const [index, step] of plan.steps.entries()) {
    const where = `${label}.steps[${index}]`;

    if ((step.timeFrom === null) !== (step.timeTo === null)) {
      issues.push(`${where}: timeFrom and timeTo must both be set or both be null`);
      continue;
    }
    if (step.timeFrom === null || step.timeTo === null) continue;

    const from = parseLocalDateTime(step.timeFrom);
    const to = parseLocalDateTime(step.timeTo);
    if (!from || !to) {
      issues.push(`${where}: invalid time`);
      continue;
    }

    if (step.timeTo <= step.timeFrom) {
      issues.push(`${where}: timeTo must be after timeFrom`);
    }
    for (const date of [from.date, to.date]) {
      if (date < window.startDate || date > window.endDate) {
        issues.push(`${where}: ${date} is outside ${window.startDate} to ${window.endDate}`);
        break;
      }
    }
  }

  return issues;
}

function renumber(plan: PlanOption): { plan: PlanOption; changed: boolean } {
  const changed = plan.steps.some((step, index) => step.order !== index + 1);
  if (!changed) return { plan, changed };
  return {
    plan: { ...plan, steps: plan.steps.map((step, index) => ({ ...step, order: index + 1 })) },
    changed,
  };
}

// ============================================
// VALIDATION
// ============================================

export function validateModelOutput(value: unknown, window: DateWindow): ValidationResult {
  const parsed = ModelPlanOutputSchema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    };
  }

  const output: ModelPlanOutput = { ...parsed.data };
  const notes: string[] = [];

  if (!output.taskFeasibility.feasible) {
    if (output.planA || output.planB) {
      notes.push("Dropped plans from an infeasible response");
    }
    return { ok: true, value: { ...output, planA: null, planB: null }, notes };
  }

  if (!output.planA || !output.planB) {
    return { ok: false, issues: ["Feasible responses must include both planA and planB"] };
  }

  const issues = [
    ...checkPlanTimes("planA", output.planA, window),
    ...checkPlanTimes("planB", output.planB, window),
  ];
  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const a = renumber(output.planA);
  const b = renumber(output.planB);
  if (a.changed) notes.push("Renumbered planA steps");
  if (b.changed) notes.push("Renumbered planB steps");
  let planA = a.plan;
  let planB = b.plan;

  if (planA.recommended === planB.recommended) {
    const preferA = compareRiskLevels(planA.overallRisk, planB.overallRisk) < 0;
    planA = { ...planA, recommended: preferA };
    planB = { ...planB, recommended: !preferA };
    notes.push(`Recommended ${preferA ? "planA" : "planB"} as the lower-risk option`);
  }

  return { ok: true, value: { ...output, planA, planB }, notes };
}

/**
 * Extract, parse, and validate raw model text.
 * Throws ResponseValidationError when the text cannot be used.
 */
export function parseModelOutput(
  text: string,
  window: DateWindow
): { value: ModelPlanOutput; notes: string[] } {
  const payload = extractJsonPayload(text);

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    throw new ResponseValidationError("Model response is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = validateModelOutput(json, window);
  if (!result.ok) {
    throw new ResponseValidationError("Model response failed validation", result.issues);
  }
  return { value: result.value, notes: result.notes };
}
