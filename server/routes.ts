import type { Express } from "express";
import type { Server } from "http";
import { z } from "zod";
import { IsoDateSchema, PlanRequestSchema } from "@shared/schema";
import {
  planItinerary,
  createSkillContext,
  type LLMClient,
  type OrchestratorConfig,
} from "../packages/core";
import type { WeatherService } from "./weather-service";

export interface RouteDependencies {
  weather: Pick<WeatherService, "getWeather" | "getForecastWindow">;
  /** Called once per request so LLM debug info never mixes between requests */
  createLLM: () => LLMClient;
  simulationMode: boolean;
  debugMode: boolean;
}

const WeatherQuerySchema = z.object({
  location: z.string().trim().min(1).max(200),
  date: IsoDateSchema,
  simulate: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === "true")),
});

function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  deps: RouteDependencies
): Promise<Server> {

  // ============ PLANNING ============

  app.post("/api/plan", async (req, res, next) => {
    try {
      const parsed = PlanRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error) });
      }

      const config: OrchestratorConfig = {
        debugMode: deps.debugMode || req.query.debug === "true",
        useLLM: true,
        simulationMode: deps.simulationMode,
      };

      const ctx = createSkillContext(config, {
        getForecast: (location, startDate, endDate, options) =>
          deps.weather.getForecastWindow(location, startDate, endDate, options),
        llm: deps.createLLM(),
      });

      const result = await planItinerary(parsed.data, ctx);

      if (result.type === "error") {
        console.error("Planning error:", result.error);
        return res.status(500).json({ error: "planning_failed", details: result.error });
      }

      return res.json(result.debug ? { ...result.response, debug: result.debug } : result.response);
    } catch (error) {
      next(error);
    }
  });

  // ============ WEATHER ============

  app.get("/api/weather", async (req, res, next) => {
    try {
      const parsed = WeatherQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error) });
      }

      const { location, date, simulate } = parsed.data;
      const weather = await deps.weather.getWeather(location, date, { simulate });
      return res.json(weather);
    } catch (error) {
      next(error);
    }
  });

  // ============ HEALTH ============

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      simulationMode: deps.simulationMode,
      llmAvailable: deps.createLLM().isAvailable(),
    });
  });

  return httpServer;
}
