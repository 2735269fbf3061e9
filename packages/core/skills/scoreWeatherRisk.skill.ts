/**
 * SCORE WEATHER RISK SKILL
 *
 * Turns a forecast window into one RiskAssessment per day, plus the worst
 * level and the largest buffer across the window.
 *
 * DETERMINISTIC: risk/scoring.ts
 */

import { z } from "zod";
import {
  RiskAssessmentSchema,
  RiskLevelSchema,
  WeatherConditionSchema,
  type RiskAssessment,
  type WeatherCondition,
} from "@shared/schema";
import type { Skill } from "./types";
import {
  calculateBufferMinutes,
  calculateRiskScore,
  explainRisk,
  formatWeatherSummary,
  maxRiskLevel,
  riskLevelForScore,
} from "../risk";

const ScoreWeatherRiskInputSchema = z.object({
  forecast: z.array(WeatherConditionSchema),
});

const ScoreWeatherRiskOutputSchema = z.object({
  assessments: z.array(RiskAssessmentSchema),
  overallLevel: RiskLevelSchema,
  maxBufferMinutes: z.number().int().min(0),
});

export type ScoreWeatherRiskInput = z.infer<typeof ScoreWeatherRiskInputSchema>;
export type ScoreWeatherRiskOutput = z.infer<typeof ScoreWeatherRiskOutputSchema>;

export function assessDay(weather: WeatherCondition): RiskAssessment {
  const score = calculateRiskScore(weather);
  const level = riskLevelForScore(score);
  return {
    date: weather.forecastDate,
    score,
    level,
    bufferMinutes: calculateBufferMinutes(weather),
    explanation: explainRisk(level, weather),
    summary: formatWeatherSummary(weather),
  };
}

export function scoreForecast(forecast: WeatherCondition[]): ScoreWeatherRiskOutput {
  const assessments = forecast.map(assessDay);
  return {
    assessments,
    overallLevel: maxRiskLevel(assessments.map((a) => a.level)),
    maxBufferMinutes: assessments.reduce((max, a) => Math.max(max, a.bufferMinutes), 0),
  };
}

export const scoreWeatherRiskSkill: Skill<ScoreWeatherRiskInput, ScoreWeatherRiskOutput> = {
  name: "scoreWeatherRisk",

  inputSchema: ScoreWeatherRiskInputSchema,
  outputSchema: ScoreWeatherRiskOutputSchema,

  async run(_ctx, input) {
    const output = scoreForecast(input.forecast);
    const notes = output.assessments.map(
      (a) => `${a.date}: score=${a.score} level=${a.level} buffer=${a.bufferMinutes}m`
    );
    return {
      output,
      meta: { ok: true, usedFallback: false, notes },
    };
  },

  fallback() {
    return { assessments: [], overallLevel: "medium", maxBufferMinutes: 0 };
  },
};
