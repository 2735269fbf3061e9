/**
 * WEATHER RISK SCORING
 *
 * Turns a forecast into a bounded 0-100 score, a risk level, and the
 * transition buffer a plan should leave around weather-exposed steps.
 *
 * DETERMINISTIC: fixed bands, no LLM.
 */

import type { RiskLevel, WeatherCondition } from "@shared/schema";
import { RISK_LEVELS } from "@shared/schema";

const SEVERE_PATTERN = /thunderstorm|storm|heavy rain|hail|severe|blizzard/;
const RAIN_PATTERN = /rain|drizzle|shower/;
const SNOW_PATTERN = /snow|sleet/;

export const MAX_BUFFER_MINUTES = 45;

function isSevere(condition: string): boolean {
  return SEVERE_PATTERN.test(condition.toLowerCase());
}

function isSnow(condition: string): boolean {
  return SNOW_PATTERN.test(condition.toLowerCase());
}

function precipitationPoints(chance: number): number {
  if (chance >= 80) return 40;
  if (chance >= 60) return 30;
  if (chance >= 40) return 20;
  if (chance >= 20) return 10;
  return 0;
}

function windPoints(speedKmh: number): number {
  if (speedKmh >= 40) return 20;
  if (speedKmh >= 25) return 10;
  if (speedKmh >= 15) return 5;
  return 0;
}

function conditionPoints(condition: string): number {
  const lower = condition.toLowerCase();
  if (isSevere(lower)) return 40;
  if (RAIN_PATTERN.test(lower)) return 15;
  if (isSnow(lower)) return 20;
  return 0;
}

function temperaturePoints(temperatureC: number): number {
  if (temperatureC >= 35) return 15;
  if (temperatureC <= -5) return 10;
  return 0;
}

export function calculateRiskScore(weather: WeatherCondition): number {
  const score =
    precipitationPoints(weather.precipitationChance) +
    windPoints(weather.windSpeedKmh) +
    conditionPoints(weather.condition) +
    temperaturePoints(weather.temperatureC);
  return Math.max(0, Math.min(100, score));
}

export function riskLevelForScore(score: number): RiskLevel {
  if (score >= 60) return "critical";
  if (score >= 40) return "high";
  if (score >= 20) return "medium";
  return "low";
}

export function calculateWeatherRisk(weather: WeatherCondition): RiskLevel {
  return riskLevelForScore(calculateRiskScore(weather));
}

/**
 * Minutes of slack to leave before a weather-exposed step or a change of
 * venue. Grows with the chance of rain; storms and snow add to it.
 */
export function calculateBufferMinutes(weather: WeatherCondition): number {
  const chance = weather.precipitationChance;
  let minutes = 0;
  if (chance >= 80) minutes = 30;
  else if (chance >= 60) minutes = 20;
  else if (chance >= 40) minutes = 15;
  else if (chance >= 20) minutes = 5;

  if (isSevere(weather.condition)) minutes += 15;
  else if (isSnow(weather.condition)) minutes += 10;

  return Math.min(MAX_BUFFER_MINUTES, minutes);
}

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

export function maxRiskLevel(levels: RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (worst, level) => (compareRiskLevels(level, worst) > 0 ? level : worst),
    "low"
  );
}

export function explainRisk(level: RiskLevel, weather: WeatherCondition): string {
  const reasons: string[] = [];
  const condition = weather.condition.toLowerCase();

  if (weather.precipitationChance >= 50) {
    reasons.push(`High precipitation chance (${weather.precipitationChance}%)`);
  }
  if (weather.windSpeedKmh >= 25) {
    reasons.push(`Strong winds (${weather.windSpeedKmh} km/h)`);
  }
  if (condition.includes("rain") || condition.includes("storm")) {
    reasons.push(`Unfavorable conditions (${weather.condition})`);
  }

  if (reasons.length === 0) {
    return level === "low"
      ? "Weather conditions are favorable for outdoor activities."
      : "Minor weather concerns that shouldn't significantly impact plans.";
  }
  return reasons.join(" | ");
}

/**
 * Hour (24h) a weather-exposed step starting at `hour` should move to, or
 * null when it can stay. Rain tends to build through the afternoon, so wet
 * days pull afternoon steps into the morning; hot days push midday steps
 * into the early evening.
 */
export function suggestTimeShift(weather: WeatherCondition, hour: number): number | null {
  if (weather.precipitationChance >= 50) {
    if (hour >= 14) return 10;
    if (hour >= 12) return 9;
  }
  if (weather.temperatureC >= 32 && hour >= 11 && hour <= 15) {
    return 17;
  }
  return null;
}

function titleCase(text: string): string {
  return text.replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

export function formatWeatherSummary(weather: WeatherCondition): string {
  return (
    `${titleCase(weather.condition)}, ${weather.temperatureC}°C, ` +
    `${weather.precipitationChance}% chance of rain, ` +
    `wind ${weather.windSpeedKmh} km/h`
  );
}
