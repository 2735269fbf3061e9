/**
 * CHECK FEASIBILITY SKILL
 *
 * Reality check run before any LLM call: rejects tasks the location cannot
 * physically host (a beach day inland, skiing without snow).
 *
 * DETERMINISTIC: Requirement and place tables (data/geography.json).
 * LLM: Not used. Unknown places pass unverified; the planning model runs its
 * own reality check afterwards.
 */

import { z } from "zod";
import { TaskFeasibilitySchema } from "@shared/schema";
import geography from "../data/geography.json";
import type { Skill } from "./types";
import { findKeywords } from "./keywords";

// ============================================
// SCHEMAS
// ============================================

const PlaceFeatureSchema = z.enum(["coast", "lake", "mountains", "snow", "desert"]);
export type PlaceFeature = z.infer<typeof PlaceFeatureSchema>;

const GeographySchema = z.object({
  requirements: z.array(
    z.object({
      id: z.string(),
      label: z.string(),
      need: z.string(),
      keywords: z.array(z.string().min(1)),
      anyOf: z.array(PlaceFeatureSchema).min(1),
    })
  ),
  places: z.array(
    z.object({
      name: z.string(),
      aliases: z.array(z.string()),
      features: z.array(PlaceFeatureSchema),
      alternatives: z.record(z.string()),
    })
  ),
});

export type ActivityRequirement = z.infer<typeof GeographySchema>["requirements"][number];
export type KnownPlace = z.infer<typeof GeographySchema>["places"][number];

const CheckFeasibilityInputSchema = z.object({
  task: z.string(),
  location: z.string(),
});

const CheckFeasibilityOutputSchema = TaskFeasibilitySchema.extend({
  verified: z.boolean(),
  matchedRequirements: z.array(z.string()),
  resolvedPlace: z.string().nullable(),
});

export type CheckFeasibilityInput = z.infer<typeof CheckFeasibilityInputSchema>;
export type CheckFeasibilityOutput = z.infer<typeof CheckFeasibilityOutputSchema>;

const GEOGRAPHY = GeographySchema.parse(geography);

// ============================================
// PLACE RESOLUTION
// ============================================

function normalizePlace(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

const PLACE_INDEX = new Map<string, KnownPlace>();
for (const place of GEOGRAPHY.places) {
  for (const key of [place.name, ...place.aliases]) {
    PLACE_INDEX.set(normalizePlace(key), place);
  }
}

/**
 * Match "Anand", "anand, gujarat, india" etc. against the known places:
 * the whole string first, then its first comma-separated segment.
 */
export function resolveKnownPlace(location: string): KnownPlace | null {
  const full = normalizePlace(location);
  const head = normalizePlace(location.split(",")[0] ?? "");
  return PLACE_INDEX.get(full) ?? PLACE_INDEX.get(head) ?? null;
}

export function findRequirements(task: string): ActivityRequirement[] {
  return GEOGRAPHY.requirements.filter(
    (requirement) => findKeywords(task, requirement.keywords).length > 0
  );
}

// ============================================
// FEASIBILITY
// ============================================

export function checkFeasibility(task: string, location: string): CheckFeasibilityOutput {
  const requirements = findRequirements(task);
  const place = resolveKnownPlace(location);
  const matchedRequirements = requirements.map((r) => r.id);

  if (!place) {
    return {
      feasible: true,
      reason: `No known geographic limits for ${location.trim()}; proceeding with planning`,
      suggestion: null,
      verified: false,
      matchedRequirements,
      resolvedPlace: null,
    };
  }

  const unmet = requirements.find(
    (requirement) => !requirement.anyOf.some((feature) => place.features.includes(feature))
  );

  if (unmet) {
    const alternative = place.alternatives[unmet.id];
    return {
      feasible: false,
      reason: `${unmet.label} needs ${unmet.need}, and ${place.name} has none.`,
      suggestion: alternative ? `Try ${alternative} instead.` : `Pick a location with ${unmet.need}.`,
      verified: true,
      matchedRequirements,
      resolvedPlace: place.name,
    };
  }

  return {
    feasible: true,
    reason:
      requirements.length > 0
        ? `${place.name} has ${requirements.map((r) => r.need).join(" and ")}`
        : `Nothing in the request depends on ${place.name}'s geography`,
    suggestion: null,
    verified: true,
    matchedRequirements,
    resolvedPlace: place.name,
  };
}

// ============================================
// SKILL DEFINITION
// ============================================

export const checkFeasibilitySkill: Skill<CheckFeasibilityInput, CheckFeasibilityOutput> = {
  name: "checkFeasibility",

  inputSchema: CheckFeasibilityInputSchema,
  outputSchema: CheckFeasibilityOutputSchema,

  async run(_ctx, input) {
    const output = checkFeasibility(input.task, input.location);
    const notes = [
      `place=${output.resolvedPlace ?? "unknown"} requirements=[${output.matchedRequirements.join(", ")}] feasible=${output.feasible}`,
    ];
    return {
      output,
      meta: { ok: true, usedFallback: false, notes },
    };
  },

  fallback() {
    // Let the request through; the model still performs its own check
    return {
      feasible: true,
      reason: "Feasibility could not be checked; proceeding with planning",
      suggestion: null,
      verified: false,
      matchedRequirements: [],
      resolvedPlace: null,
    };
  },
};
