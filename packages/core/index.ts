/**
 * ALMANAC CORE — MAIN EXPORTS
 *
 * Skill-based pipeline for weather-aware itinerary planning.
 */

// Skills (includes LLMClient and LLMDebugInfo types)
export * from "./skills";

// Orchestrator
export {
  planItinerary,
  createSkillContext,
  type OrchestratorConfig,
  type OrchestratorOutput,
  type DebugOutput,
} from "./orchestrator";

// LLM Client implementations (not types - those come from skills)
export { createGeminiClient, createNullLLMClient, DEFAULT_GEMINI_MODEL, DEFAULT_GEMINI_BASE_URL } from "./llm";

// Deterministic building blocks
export * from "./risk";
export * from "./schedule";
export * from "./validation";
