import { z } from "zod";
import type { WeatherCondition } from "@shared/schema";
import { enumerateDates } from "../packages/core/schedule";
import { log } from "./log";

export const DEFAULT_WEATHER_BASE_URL = "https://wttr.in";
const USER_AGENT = "Almanac-Planner/1.0";
const MIDDAY_HOURLY_INDEX = 4; // wttr.in reports 3-hourly slots; index 4 is 12:00

export interface WeatherLookupOptions {
  simulate?: boolean;
}

export interface WeatherServiceOptions {
  simulationMode?: boolean;
  baseUrl?: string;
  cacheTtlMs?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: (message: string, source?: string) => void;
}

export interface WeatherService {
  getWeather(location: string, date: string, options?: WeatherLookupOptions): Promise<WeatherCondition>;
  getForecastWindow(
    location: string,
    startDate: string,
    endDate: string,
    options?: WeatherLookupOptions
  ): Promise<WeatherCondition[]>;
  clearCache(): void;
  cacheSize(): number;
}

// ============================================
// SIMULATED WEATHER
// ============================================

const SIMULATED_CONDITIONS = [
  { condition: "sunny", weight: 0.25, precipitation: [0, 10] },
  { condition: "partly cloudy", weight: 0.25, precipitation: [5, 25] },
  { condition: "cloudy", weight: 0.2, precipitation: [15, 40] },
  { condition: "light rain", weight: 0.15, precipitation: [50, 70] },
  { condition: "rainy", weight: 0.1, precipitation: [70, 90] },
  { condition: "thunderstorms", weight: 0.05, precipitation: [80, 100] },
] as const;

/** 32-bit FNV-1a over UTF-16 code units. */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Deterministic stand-in weather for a location and date.
 * WARNING: This is FAKE data - only used in simulation mode or when the API fails
 */
export function generateSimulatedWeather(location: string, date: string): WeatherCondition {
  const random = seededRandom(fnv1a(`${location.trim().toLowerCase()}_${date}`));
  const uniform = (min: number, max: number) => min + random() * (max - min);
  const randint = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));

  let roll = random();
  let picked: (typeof SIMULATED_CONDITIONS)[number] = SIMULATED_CONDITIONS[SIMULATED_CONDITIONS.length - 1];
  for (const entry of SIMULATED_CONDITIONS) {
    if (roll < entry.weight) {
      picked = entry;
      break;
    }
    roll -= entry.weight;
  }

  let temperature = uniform(15, 28);
  if (/rain|storm/.test(picked.condition)) {
    temperature -= uniform(3, 8);
  }

  const [minPrecip, maxPrecip] = picked.precipitation;

  return {
    temperatureC: round1(temperature),
    condition: picked.condition,
    precipitationChance: randint(minPrecip, maxPrecip),
    windSpeedKmh: round1(uniform(5, 25)),
    humidityPercent: randint(40, 85),
    forecastDate: date,
    location: location.trim(),
    isSimulated: true,
  };
}

// ============================================
// WTTR.IN PAYLOAD
// ============================================

// Missing or garbled readings take a neutral default instead of rejecting the day
const numberOr = (fallback: number) => z.coerce.number().finite().catch(fallback);

const WttrHourlySchema = z.object({
  chanceofrain: numberOr(0),
  windspeedKmph: numberOr(10),
  humidity: numberOr(65),
  weatherDesc: z.array(z.object({ value: z.string() })).optional(),
});

const WttrResponseSchema = z.object({
  weather: z.array(
    z.object({
      date: z.string(),
      maxtempC: numberOr(20),
      mintempC: numberOr(15),
      hourly: z.array(WttrHourlySchema).min(1),
    })
  ),
  nearest_area: z
    .array(z.object({ areaName: z.array(z.object({ value: z.string() })) }))
    .optional(),
});

type WttrResponse = z.infer<typeof WttrResponseSchema>;

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function parseWttrForecast(payload: WttrResponse, query: string): Map<string, WeatherCondition> {
  const areaName = payload.nearest_area?.[0]?.areaName[0]?.value?.trim();
  const location = areaName || query.trim();
  const days = new Map<string, WeatherCondition>();

  for (const day of payload.weather) {
    const midday = day.hourly[MIDDAY_HOURLY_INDEX] ?? day.hourly[0];
    const description = midday.weatherDesc?.[0]?.value?.trim().toLowerCase();
    days.set(day.date, {
      temperatureC: round1((day.maxtempC + day.mintempC) / 2),
      condition: description || "partly cloudy",
      precipitationChance: clampPercent(midday.chanceofrain),
      windSpeedKmh: Math.max(0, midday.windspeedKmph),
      humidityPercent: clampPercent(midday.humidity),
      forecastDate: day.date,
      location,
      isSimulated: false,
    });
  }
  return days;
}

// ============================================
// SERVICE
// ============================================

interface CacheEntry {
  weather: WeatherCondition;
  storedAt: number;
}

export function createWeatherService(options: WeatherServiceOptions = {}): WeatherService {
  const baseUrl = (options.baseUrl || DEFAULT_WEATHER_BASE_URL).replace(/\/+$/, "");
  const cacheTtlMs = options.cacheTtlMs ?? 30 * 60 * 1000;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? log;

  const cache = new Map<string, CacheEntry>();
  const inFlight = new Map<string, Promise<Map<string, WeatherCondition> | null>>();

  const locationKey = (location: string) => location.trim().toLowerCase();
  const cacheKey = (location: string, date: string) => `${locationKey(location)}|${date}`;

  const readCache = (location: string, date: string): WeatherCondition | null => {
    const key = cacheKey(location, date);
    const entry = cache.get(key);
    if (!entry) return null;
    if (now() - entry.storedAt >= cacheTtlMs) {
      cache.delete(key);
      return null;
    }
    return entry.weather;
  };

  const writeCache = (location: string, weather: WeatherCondition) => {
    cache.set(cacheKey(location, weather.forecastDate), { weather, storedAt: now() });
  };

  const requestForecast = async (location: string): Promise<Map<string, WeatherCondition> | null> => {
    const url = `${baseUrl}/${encodeURIComponent(location.trim())}?format=j1`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    // Settles on timeout even when the transport ignores the abort signal
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new Error(`timed out after ${timeoutMs}ms`)),
        { once: true }
      );
    });

    try {
      const response = await Promise.race([
        fetchImpl(url, {
          headers: { "User-Agent": USER_AGENT },
          signal: controller.signal,
        }),
        timedOut,
      ]);
      if (!response.ok) {
        logger(`API returned ${response.status} for ${location}`, "weather");
        return null;
      }

      const body: unknown = await Promise.race([response.json(), timedOut]);
      const parsed = WttrResponseSchema.safeParse(body);
      if (!parsed.success) {
        logger(`Unexpected payload for ${location}: ${parsed.error.issues[0]?.message ?? "invalid"}`, "weather");
        return null;
      }

      const days = parseWttrForecast(parsed.data, location);
      days.forEach((weather) => writeCache(location, weather));
      return days;
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      logger(`Failed to fetch weather for ${location}: ${reason}`, "weather");
      return null;
    } finally {
      clearTimeout(timer);
    }
  };

  // One request per location at a time; concurrent callers share it
  const fetchForecast = (location: string): Promise<Map<string, WeatherCondition> | null> => {
    const key = locationKey(location);
    const pending = inFlight.get(key);
    if (pending) return pending;

    const request = requestForecast(location).finally(() => inFlight.delete(key));
    inFlight.set(key, request);
    return request;
  };

  const simulateDay = (location: string, date: string): WeatherCondition => {
    const simulated = generateSimulatedWeather(location, date);
    writeCache(location, simulated);
    return simulated;
  };

  const fromLive = (
    days: Map<string, WeatherCondition> | null,
    location: string,
    date: string
  ): WeatherCondition => {
    const live = days?.get(date);
    if (live) return live;

    logger(`⚠️ SIMULATED weather for ${location} on ${date} (no live forecast)`, "weather");
    return simulateDay(location, date);
  };

  const getWeather = async (
    location: string,
    date: string,
    lookup: WeatherLookupOptions = {}
  ): Promise<WeatherCondition> => {
    const cached = readCache(location, date);
    if (cached) return cached;

    if (options.simulationMode || lookup.simulate) {
      return simulateDay(location, date);
    }

    return fromLive(await fetchForecast(location), location, date);
  };

  // At most one API call per window: its answer (or failure) covers every uncached date
  const getForecastWindow = async (
    location: string,
    startDate: string,
    endDate: string,
    lookup: WeatherLookupOptions = {}
  ): Promise<WeatherCondition[]> => {
    const simulate = options.simulationMode || lookup.simulate;
    let live: Promise<Map<string, WeatherCondition> | null> | null = null;
    const forecast: WeatherCondition[] = [];

    for (const date of enumerateDates(startDate, endDate)) {
      const cached = readCache(location, date);
      if (cached) {
        forecast.push(cached);
      } else if (simulate) {
        forecast.push(simulateDay(location, date));
      } else {
        if (!live) live = fetchForecast(location);
        forecast.push(fromLive(await live, location, date));
      }
    }
    return forecast;
  };

  return {
    getWeather,
    getForecastWindow,
    clearCache: () => cache.clear(),
    cacheSize: () => cache.size,
  };
}
