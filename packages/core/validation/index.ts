export {
  ResponseValidationError,
  extractJsonPayload,
  validateModelOutput,
  parseModelOutput,
  type DateWindow,
  type ValidationResult,
} from "./response-validator";
