import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { loadConfig, type AppConfig } from "./config";
import { log, requestLogger } from "./log";
import { createWeatherService } from "./weather-service";
import { createGeminiClient, createNullLLMClient } from "../packages/core/llm";

// ── Startup env-var validation ──────────────────────────────────────
function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(
      `\n❌  ${error instanceof Error ? error.message : String(error)}\n\nCopy .env.example to .env and fix the values.\n`,
    );
    process.exit(1);
  }
}

const config = readConfig();

if (!config.gemini.apiKey) {
  console.warn(
    "⚠️  GEMINI_API_KEY not set: plans will come from the deterministic fallback planner",
  );
}
if (config.simulationMode) {
  console.warn("⚠️  SIMULATION_MODE is on: all weather is simulated");
}
// ────────────────────────────────────────────────────────────────────

const app = express();
const httpServer = createServer(app);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));
app.use(requestLogger);

const weather = createWeatherService({
  simulationMode: config.simulationMode,
  baseUrl: config.weather.baseUrl,
  cacheTtlMs: config.weather.cacheTtlMinutes * 60 * 1000,
  timeoutMs: config.weather.timeoutMs,
});

const gemini = config.gemini;
const createLLM = () =>
  gemini.apiKey
    ? createGeminiClient({ apiKey: gemini.apiKey, baseUrl: gemini.baseUrl, model: gemini.model })
    : createNullLLMClient("API key not configured (GEMINI_API_KEY)");

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number") return candidate;
  }
  return 500;
}

(async () => {
  await registerRoutes(httpServer, app, {
    weather,
    createLLM,
    simulationMode: config.simulationMode,
    debugMode: config.debugMode,
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    console.error("Internal Server Error:", err);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  const port = config.port;
  httpServer.listen(
    {
      port,
      host: "0.0.0.0",
    },
    () => {
      log(`serving on port ${port}`);
    },
  );
})().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
