export { planItinerary, createSkillContext, type OrchestratorConfig } from "./orchestrator";
export {
  OrchestratorOutputSchema,
  DebugOutputSchema,
  type OrchestratorOutput,
  type DebugOutput,
  type SkillRunDebug,
} from "./schemas";
