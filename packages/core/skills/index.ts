/**
 * ALMANAC SKILL SYSTEM — EXPORTS
 */

// Types and runner
export * from "./types";

// Individual skills
export { checkFeasibilitySkill, checkFeasibility, resolveKnownPlace } from "./checkFeasibility.skill";
export { classifyActivitySkill, classifyActivity } from "./classifyActivity.skill";
export { scoreWeatherRiskSkill, scoreForecast, assessDay } from "./scoreWeatherRisk.skill";
export { generatePlansSkill, buildFallbackPlans } from "./generatePlans.skill";
export { buildPlanPrompt, PLANNER_SYSTEM_INSTRUCTION } from "./planPrompts";
export { findKeywords, matchesKeyword } from "./keywords";
