/**
 * CLASSIFY ACTIVITY SKILL
 *
 * Decides how much the weather matters for a free-text task.
 *
 * DETERMINISTIC: Keyword tables (data/activity-keywords.json).
 * LLM: Not used.
 *
 * Rules (first match wins):
 * - outdoor keywords, at least as many as indoor => high
 * - "outside" / "outdoors" / "open air"           => high
 * - nothing recognised                            => low (weather may still matter)
 * - some outdoor, more indoor                     => low
 * - indoor only                                   => none
 */

import { z } from "zod";
import { WeatherRelevanceSchema, type WeatherRelevance } from "@shared/schema";
import activityKeywords from "../data/activity-keywords.json";
import type { Skill } from "./types";
import { findKeywords } from "./keywords";

// ============================================
// SCHEMAS
// ============================================

const ClassifyActivityInputSchema = z.object({
  text: z.string(),
});

export type ClassifyActivityInput = z.infer<typeof ClassifyActivityInputSchema>;
export type ClassifyActivityOutput = WeatherRelevance;

const KeywordTablesSchema = z.object({
  outdoor: z.array(z.string().min(1)),
  indoor: z.array(z.string().min(1)),
});

const KEYWORDS = KeywordTablesSchema.parse(activityKeywords);

const OUTSIDE_PATTERN = /\b(outside|outdoors|open[-\s]air)\b/i;

// ============================================
// CLASSIFICATION
// ============================================

export function classifyActivity(text: string): WeatherRelevance {
  const outdoor = findKeywords(text, KEYWORDS.outdoor);
  const indoor = findKeywords(text, KEYWORDS.indoor);

  if (outdoor.length > 0 && outdoor.length >= indoor.length) {
    return {
      isRelevant: true,
      sensitivity: "high",
      confidence: 0.9,
      explanation: `Identified outdoor activities: ${outdoor.join(", ")}`,
      outdoorActivities: outdoor,
    };
  }

  if (OUTSIDE_PATTERN.test(text)) {
    return {
      isRelevant: true,
      sensitivity: "high",
      confidence: 0.8,
      explanation: "The request explicitly takes place outdoors",
      outdoorActivities: ["outdoor activity"],
    };
  }

  if (outdoor.length === 0 && indoor.length === 0) {
    return {
      isRelevant: true,
      sensitivity: "low",
      confidence: 0.7,
      explanation: "No specific activities identified, but weather may still be relevant",
      outdoorActivities: [],
    };
  }

  if (outdoor.length > 0) {
    return {
      isRelevant: true,
      sensitivity: "low",
      confidence: 0.7,
      explanation: `Mostly indoor (${indoor.join(", ")}) with some outdoor time: ${outdoor.join(", ")}`,
      outdoorActivities: outdoor,
    };
  }

  return {
    isRelevant: false,
    sensitivity: "none",
    confidence: 0.85,
    explanation: `Indoor or weather-independent activities: ${indoor.join(", ")}`,
    outdoorActivities: [],
  };
}

// ============================================
// SKILL DEFINITION
// ============================================

export const classifyActivitySkill: Skill<ClassifyActivityInput, ClassifyActivityOutput> = {
  name: "classifyActivity",

  inputSchema: ClassifyActivityInputSchema,
  outputSchema: WeatherRelevanceSchema,

  async run(_ctx, input) {
    const output = classifyActivity(input.text);
    return {
      output,
      meta: {
        ok: true,
        usedFallback: false,
        notes: [`sensitivity=${output.sensitivity} confidence=${output.confidence}`],
      },
    };
  },

  fallback() {
    // Assume weather matters when unsure
    return {
      isRelevant: true,
      sensitivity: "low",
      confidence: 0.5,
      explanation: "Classification unavailable; assuming weather may be relevant",
      outdoorActivities: [],
    };
  },
};
