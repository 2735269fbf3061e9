/**
 * Shared fixtures for skill and orchestrator tests.
 */

import { vi } from "vitest";
import type { PlanOption, WeatherCondition } from "@shared/schema";
import type { GenerateOptions, LLMClient, LLMDebugInfo, OutputSchema, SkillContext } from "../types";
import { extractJsonPayload } from "../../validation";

export function weatherFixture(overrides: Partial<WeatherCondition> = {}): WeatherCondition {
  return {
    temperatureC: 21,
    condition: "sunny",
    precipitationChance: 5,
    windSpeedKmh: 8,
    humidityPercent: 50,
    forecastDate: "2026-05-02",
    location: "Chicago",
    isSimulated: false,
    ...overrides,
  };
}

export function planFixture(overrides: Partial<PlanOption> = {}): PlanOption {
  return {
    name: "Original Plan",
    summary: "Picnic by the lake",
    steps: [
      {
        order: 1,
        description: "Picnic in the park",
        timeFrom: "2026-05-02T12:00",
        timeTo: "2026-05-02T14:00",
        location: "Lincoln Park",
        weatherSensitive: true,
        riskNote: null,
      },
    ],
    overallRisk: "low",
    riskExplanation: "Clear skies",
    recommended: false,
    ...overrides,
  };
}

export interface StubLLM {
  client: LLMClient;
  calls: Array<{ prompt: string; options?: GenerateOptions }>;
}

/**
 * In-process stand-in for the Gemini client: replies with fixed text (parsed
 * through the caller's schema, like the real client) or fails with an error.
 */
export function createStubLLM(reply: string | Error, available = true): StubLLM {
  const calls: StubLLM["calls"] = [];
  const idle = (): LLMDebugInfo => ({ called: false, provider: "none", validated: false });
  let debugInfo = idle();

  const client: LLMClient = {
    async generate<T = string>(prompt: string, schema?: OutputSchema<T>, options?: GenerateOptions): Promise<T> {
      calls.push({ prompt, options });
      debugInfo = { called: true, provider: "gemini", model: "stub-model", validated: false };
      if (reply instanceof Error) {
        debugInfo.fallbackReason = reply.message;
        throw reply;
      }
      if (!schema) {
        throw new Error("Stub LLM only serves structured output");
      }
      const value = schema.parse(JSON.parse(extractJsonPayload(reply)));
      debugInfo.validated = true;
      return value;
    },
    isAvailable: () => available,
    getDebugInfo: () => ({ ...debugInfo }),
    resetDebugInfo: () => {
      debugInfo = idle();
    },
  };

  return { client, calls };
}

export const createMockContext = (
  options: {
    llm?: LLMClient;
    useLLM?: boolean;
    forecast?: WeatherCondition[];
    simulationMode?: boolean;
    debugMode?: boolean;
  } = {}
): SkillContext => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  now: new Date("2026-04-30T08:00:00Z"),
  timezone: "UTC",
  getForecast: vi.fn(async () => options.forecast ?? []),
  llm: options.llm ?? createStubLLM(new Error("LLM disabled"), false).client,
  flags: {
    debugMode: options.debugMode ?? false,
    useLLM: options.useLLM ?? false,
    simulationMode: options.simulationMode ?? false,
  },
});
