import { describe, it, expect, vi } from "vitest";
import {
  createWeatherService,
  generateSimulatedWeather,
  parseWttrForecast,
  type WeatherServiceOptions,
} from "../weather-service";

const QUIET_HOUR = { chanceofrain: "0", windspeedKmph: "5", humidity: "50" };

function hourly(midday: Record<string, unknown>) {
  return Array.from({ length: 8 }, (_, index) => (index === 4 ? midday : QUIET_HOUR));
}

const payload = {
  weather: [
    {
      date: "2026-05-01",
      maxtempC: "24",
      mintempC: "15",
      hourly: hourly({
        chanceofrain: "40",
        windspeedKmph: "12",
        humidity: "55",
        weatherDesc: [{ value: "Partly cloudy " }],
      }),
    },
    {
      date: "2026-05-02",
      maxtempC: "19",
      mintempC: "12",
      hourly: hourly({
        chanceofrain: "85",
        windspeedKmph: "20",
        humidity: "80",
        weatherDesc: [{ value: "Patchy rain possible" }],
      }),
    },
  ],
  nearest_area: [{ areaName: [{ value: "Chicago" }] }],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function setup(overrides: WeatherServiceOptions = {}, body: unknown = payload, status = 200) {
  const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(body, status));
  const logger = vi.fn();
  const service = createWeatherService({ fetch: fetchMock, logger, ...overrides });
  return { service, fetchMock, logger };
}

describe("Weather Service - live forecasts", () => {
  it("should map the midday slot of each day from one request", async () => {
    const { service, fetchMock } = setup();

    const forecast = await service.getForecastWindow("Chicago", "2026-05-01", "2026-05-02");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://wttr.in/Chicago?format=j1");
    expect(init?.headers).toEqual({ "User-Agent": "Almanac-Planner/1.0" });
    expect(forecast).toEqual([
      {
        temperatureC: 19.5,
        condition: "partly cloudy",
        precipitationChance: 40,
        windSpeedKmh: 12,
        humidityPercent: 55,
        forecastDate: "2026-05-01",
        location: "Chicago",
        isSimulated: false,
      },
      {
        temperatureC: 15.5,
        condition: "patchy rain possible",
        precipitationChance: 85,
        windSpeedKmh: 20,
        humidityPercent: 80,
        forecastDate: "2026-05-02",
        location: "Chicago",
        isSimulated: false,
      },
    ]);
    expect(service.cacheSize()).toBe(2);
  });

  it("should encode the location and honour a custom base URL", async () => {
    const { service, fetchMock } = setup({ baseUrl: "http://localhost:8080/" });

    await service.getWeather(" São Paulo ", "2026-05-01");

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:8080/S%C3%A3o%20Paulo?format=j1");
  });

  it("should make one request for a whole window, simulating days past its horizon", async () => {
    const { service, fetchMock } = setup();

    const forecast = await service.getForecastWindow("Chicago", "2026-05-01", "2026-05-14");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(forecast).toHaveLength(14);
    expect(forecast.map((w) => w.isSimulated)).toEqual([false, false, ...Array(12).fill(true)]);
    expect(forecast[13]).toEqual(generateSimulatedWeather("Chicago", "2026-05-14"));
  });

  it("should default missing or garbled readings instead of dropping the day", async () => {
    const { service } = setup(
      {},
      {
        weather: [
          {
            date: "2026-05-03",
            mintempC: "15",
            hourly: [{ chanceofrain: "30", windspeedKmph: "n/a", weatherDesc: [{ value: "Sunny" }] }],
          },
        ],
      }
    );

    const weather = await service.getWeather("Chicago", "2026-05-03");

    expect(weather).toEqual({
      temperatureC: 17.5,
      condition: "sunny",
      precipitationChance: 30,
      windSpeedKmh: 10,
      humidityPercent: 65,
      forecastDate: "2026-05-03",
      location: "Chicago",
      isSimulated: false,
    });
  });

  it("should share one request between concurrent callers for a location", async () => {
    const { service, fetchMock } = setup();

    const [first, second] = await Promise.all([
      service.getWeather("Chicago", "2026-05-01"),
      service.getWeather("CHICAGO ", "2026-05-02"),
    ]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first.precipitationChance).toBe(40);
    expect(second.precipitationChance).toBe(85);
  });
});

describe("Weather Service - cache", () => {
  it("should serve cached days until the TTL runs out", async () => {
    let clock = 0;
    const { service, fetchMock } = setup({ cacheTtlMs: 1000, now: () => clock });

    await service.getWeather("Chicago", "2026-05-01");
    clock = 999;
    await service.getWeather("chicago", "2026-05-01");
    expect(fetchMock).toHaveBeenCalledTimes(1);

    clock = 1000;
    await service.getWeather("Chicago", "2026-05-01");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should forget everything on clearCache", async () => {
    const { service, fetchMock } = setup();

    await service.getWeather("Chicago", "2026-05-01");
    service.clearCache();
    expect(service.cacheSize()).toBe(0);

    await service.getWeather("Chicago", "2026-05-01");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe("Weather Service - fallbacks", () => {
  it("should simulate without calling the API in simulation mode", async () => {
    const { service, fetchMock } = setup({ simulationMode: true });

    const weather = await service.getWeather("Chicago", "2026-05-01");

    expect(fetchMock).not.toHaveBeenCalled();
    expect(weather).toEqual(generateSimulatedWeather("Chicago", "2026-05-01"));
  });

  it("should simulate when a single request asks for it", async () => {
    const { service, fetchMock } = setup();

    const forecast = await service.getForecastWindow("Chicago", "2026-05-01", "2026-05-03", { simulate: true });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(forecast.map((w) => w.isSimulated)).toEqual([true, true, true]);
  });

  it("should fall back to simulated weather on an HTTP error and cache it", async () => {
    const { service, fetchMock, logger } = setup({}, { message: "unavailable" }, 503);

    const weather = await service.getWeather("Chicago", "2026-05-01");
    await service.getWeather("Chicago", "2026-05-01");

    expect(weather.isSimulated).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith("API returned 503 for Chicago", "weather");
    expect(logger).toHaveBeenCalledWith(
      "⚠️ SIMULATED weather for Chicago on 2026-05-01 (no live forecast)",
      "weather"
    );
  });

  it("should not retry a failed API for every day of a window", async () => {
    const { service, fetchMock, logger } = setup({}, { message: "unavailable" }, 503);

    const forecast = await service.getForecastWindow("Chicago", "2026-05-01", "2026-05-14");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(forecast.every((w) => w.isSimulated)).toBe(true);
    const apiErrors = logger.mock.calls.filter(([message]) => message === "API returned 503 for Chicago");
    expect(apiErrors).toHaveLength(1);
  });

  it("should give up on a request that never answers", async () => {
    const { service, fetchMock, logger } = setup({ timeoutMs: 20 });
    fetchMock.mockImplementation(() => new Promise<Response>(() => {}));

    const weather = await service.getWeather("Chicago", "2026-05-01");

    expect(weather).toEqual(generateSimulatedWeather("Chicago", "2026-05-01"));
    expect(logger).toHaveBeenCalledWith("Failed to fetch weather for Chicago: timed out after 20ms", "weather");
  });

  it("should fall back when the network fails", async () => {
    const { service, fetchMock, logger } = setup();
    fetchMock.mockRejectedValueOnce(new Error("ECONNRESET"));

    const weather = await service.getWeather("Chicago", "2026-05-01");

    expect(weather.isSimulated).toBe(true);
    expect(logger).toHaveBeenCalledWith("Failed to fetch weather for Chicago: ECONNRESET", "weather");
  });

  it("should fall back on an unexpected payload", async () => {
    const { service, logger } = setup({}, { weather: "nope" });

    const weather = await service.getWeather("Chicago", "2026-05-01");

    expect(weather.isSimulated).toBe(true);
    expect(logger).toHaveBeenCalledWith(expect.stringMatching(/^Unexpected payload for Chicago: /), "weather");
  });

  it("should simulate dates the live forecast does not cover", async () => {
    const { service } = setup();

    const weather = await service.getWeather("Chicago", "2026-05-09");

    expect(weather).toEqual(generateSimulatedWeather("Chicago", "2026-05-09"));
  });
});

describe("Weather Service - simulated weather", () => {
  it("should be deterministic per location and date", () => {
    const a = generateSimulatedWeather("Paris", "2026-06-10");
    const b = generateSimulatedWeather("  paris ", "2026-06-10");

    expect({ ...b, location: "Paris" }).toEqual(a);
    expect(b.location).toBe("paris");
  });

  it("should stay within realistic ranges", () => {
    const conditions = ["sunny", "partly cloudy", "cloudy", "light rain", "rainy", "thunderstorms"];
    for (let day = 1; day <= 28; day++) {
      const date = `2026-02-${String(day).padStart(2, "0")}`;
      const weather = generateSimulatedWeather("Lisbon", date);

      expect(conditions).toContain(weather.condition);
      expect(weather.temperatureC).toBeGreaterThanOrEqual(7);
      expect(weather.temperatureC).toBeLessThanOrEqual(28);
      expect(weather.precipitationChance).toBeGreaterThanOrEqual(0);
      expect(weather.precipitationChance).toBeLessThanOrEqual(100);
      expect(weather.windSpeedKmh).toBeGreaterThanOrEqual(5);
      expect(weather.windSpeedKmh).toBeLessThanOrEqual(25);
      expect(weather.humidityPercent).toBeGreaterThanOrEqual(40);
      expect(weather.humidityPercent).toBeLessThanOrEqual(85);
      expect(weather.forecastDate).toBe(date);
      expect(weather.isSimulated).toBe(true);
    }
  });
});

describe("Weather Service - parseWttrForecast", () => {
  it("should fall back to the query and the first slot when data is sparse", () => {
    const days = parseWttrForecast(
      {
        weather: [
          {
            date: "2026-05-01",
            maxtempC: 10,
            mintempC: 3,
            hourly: [{ chanceofrain: 130, windspeedKmph: 7, humidity: 60 }],
          },
        ],
      },
      "  Reykjavik "
    );

    expect(days.get("2026-05-01")).toEqual({
      temperatureC: 6.5,
      condition: "partly cloudy",
      precipitationChance: 100,
      windSpeedKmh: 7,
      humidityPercent: 60,
      forecastDate: "2026-05-01",
      location: "Reykjavik",
      isSimulated: false,
    });
  });
});
