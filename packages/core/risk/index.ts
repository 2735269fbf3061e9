export {
  calculateRiskScore,
  riskLevelForScore,
  calculateWeatherRisk,
  calculateBufferMinutes,
  compareRiskLevels,
  maxRiskLevel,
  explainRisk,
  suggestTimeShift,
  formatWeatherSummary,
  MAX_BUFFER_MINUTES,
} from "./scoring";
