export {
  createGeminiClient,
  createNullLLMClient,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GEMINI_BASE_URL,
  type GeminiConfig,
} from "./client";
