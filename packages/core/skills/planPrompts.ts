/**
 * Prompt text for the plan generator.
 */

import type { RiskAssessment, WeatherCondition, WeatherRelevance } from "@shared/schema";
import { formatDateHuman } from "../schedule";

export const PLANNER_SYSTEM_INSTRUCTION = `You are a weather-adaptive planning assistant.

Your job is to turn a user's plan into two concrete itineraries, taking the forecast into account.

## Reality check (always first)
Decide whether the activity is physically possible at the given location before planning anything.
Examples of infeasible requests: a beach day in an inland city, skiing in a city without snow, a desert safari on a tropical coast.

If the task is NOT feasible:
- set taskFeasibility.feasible to false
- explain why in taskFeasibility.reason
- suggest the nearest sensible alternative in taskFeasibility.suggestion
- set planA and planB to null
- do not invent weather or schedules

If the task IS feasible, confirm why in taskFeasibility.reason and plan normally.

## Location and dates
- The location is supplied by the user. Use it exactly; never guess or change it.
- Plans may span several days (startDate to endDate, inclusive).
- Every step time must fall inside that range.
- Order steps chronologically, day by day.

## Plans
- planA: the plan as requested, with an honest risk assessment.
- planB: a weather-optimised alternative (different time, backup venue, shorter exposure).
- Recommend exactly one plan: the one with lower risk.
- Mark a step weatherSensitive when it takes place outdoors.
- Give specific, actionable steps and explain every key decision in decisionTrace.
- If weather is not relevant, still return two plans and say the weather barely affects either.

## Step times
- Use separate timeFrom and timeTo fields, formatted YYYY-MM-DDTHH:MM.
- Set both or neither; never write a combined range such as "08:00 - 10:00".

## Output
Return ONLY a JSON object of this shape:
{
  "taskFeasibility": { "feasible": true, "reason": "string", "suggestion": "string or null" },
  "planA": {
    "name": "string",
    "summary": "one sentence",
    "steps": [
      {
        "order": 1,
        "description": "string",
        "timeFrom": "2026-02-08T10:00 or null",
        "timeTo": "2026-02-08T12:00 or null",
        "location": "string or null",
        "weatherSensitive": true,
        "riskNote": "string or null"
      }
    ],
    "overallRisk": "low|medium|high|critical",
    "riskExplanation": "string",
    "recommended": false
  },
  "planB": { "...": "same shape as planA" },
  "decisionTrace": [{ "decision": "string", "reasoning": "string", "dataUsed": "string or null" }],
  "agentConfidence": 0.85
}`;

export interface PlanPromptInput {
  task: string;
  location: string;
  startDate: string;
  endDate: string;
  relevance: WeatherRelevance;
  forecast: WeatherCondition[];
  assessments: RiskAssessment[];
}

function describeDateRange(startDate: string, endDate: string): string {
  if (startDate === endDate) {
    return `${formatDateHuman(startDate)} (${startDate})`;
  }
  return `${formatDateHuman(startDate)} to ${formatDateHuman(endDate)} (${startDate} to ${endDate})`;
}

export function buildPlanPrompt(input: PlanPromptInput): string {
  const { relevance } = input;
  const lines = [
    `## User request`,
    input.task,
    ``,
    `## Provided context (user-supplied, do not override)`,
    `- Location: ${input.location}`,
    `- Date range: ${describeDateRange(input.startDate, input.endDate)}`,
    ``,
    `## Weather relevance`,
    `- Relevant: ${relevance.isRelevant ? "yes" : "no"} (sensitivity ${relevance.sensitivity})`,
    `- Confidence: ${Math.round(relevance.confidence * 100)}%`,
    `- Outdoor activities: ${relevance.outdoorActivities.length > 0 ? relevance.outdoorActivities.join(", ") : "none identified"}`,
  ];

  for (const weather of input.forecast) {
    const assessment = input.assessments.find((a) => a.date === weather.forecastDate);
    lines.push(
      ``,
      `## Weather for ${weather.location} on ${weather.forecastDate}`,
      `- Condition: ${weather.condition}`,
      `- Temperature: ${weather.temperatureC}°C`,
      `- Precipitation chance: ${weather.precipitationChance}%`,
      `- Wind speed: ${weather.windSpeedKmh} km/h`,
      `- Humidity: ${weather.humidityPercent}%`
    );
    if (assessment) {
      lines.push(
        `- Calculated risk level: ${assessment.level}`,
        `- Transition buffer: ${assessment.bufferMinutes} minutes`
      );
    }
    if (weather.isSimulated) {
      lines.push(
        `- WARNING: these figures are ESTIMATED (no live forecast for this date). Do not present them as real; tell the user the forecast is an estimate.`
      );
    }
  }

  lines.push(
    ``,
    `## Your task`,
    `First perform the reality check and fill in taskFeasibility.`,
    `If infeasible, set planA and planB to null.`,
    `If feasible, return planA (as requested) and planB (weather-optimised) with a decision trace.`,
    `All step times must fall within ${input.startDate} to ${input.endDate} (inclusive).`,
    `Use only the location given above.`
  );

  return lines.join("\n");
}
