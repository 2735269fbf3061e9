import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import { createGeminiClient, createNullLLMClient, DEFAULT_GEMINI_MODEL } from "../client";

const { generateContent, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { generateContent: vi.fn(), constructed };
});

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContent };
    constructor(options: unknown) {
      constructed.push(options);
    }
  },
}));

const ReplySchema = z.object({ answer: z.string() });

beforeEach(() => {
  generateContent.mockReset();
  constructed.length = 0;
});

describe("createGeminiClient", () => {
  it("is unavailable without a real key", async () => {
    const client = createGeminiClient({ apiKey: "your_gemini_api_key_here" });

    expect(client.isAvailable()).toBe(false);
    await expect(client.generate("hi")).rejects.toThrow("LLM not available: API key not configured");
    expect(generateContent).not.toHaveBeenCalled();
    expect(client.getDebugInfo()).toMatchObject({ called: true, provider: "none", fallbackReason: "API key not configured" });
  });

  it("sends the prompt and options, then validates fenced JSON", async () => {
    generateContent.mockResolvedValueOnce({ text: '```json\n{"answer": "yes"}\n```' });
    const client = createGeminiClient({ apiKey: "test-secret", baseUrl: "http://localhost:9999" });

    const result = await client.generate("Is it sunny?", ReplySchema, {
      systemInstruction: "Be brief",
      temperature: 0.4,
      json: true,
    });

    expect(result).toEqual({ answer: "yes" });
    expect(constructed).toEqual([
      { apiKey: "test-secret", httpOptions: { apiVersion: "", baseUrl: "http://localhost:9999" } },
    ]);
    expect(generateContent).toHaveBeenCalledWith({
      model: DEFAULT_GEMINI_MODEL,
      contents: [{ role: "user", parts: [{ text: "Is it sunny?" }] }],
      config: { systemInstruction: "Be brief", temperature: 0.4, responseMimeType: "application/json" },
    });
    expect(client.getDebugInfo()).toMatchObject({
      called: true,
      provider: "gemini",
      model: DEFAULT_GEMINI_MODEL,
      validated: true,
      inputTokensEstimate: 5,
    });
  });

  it("returns raw text when no schema is given", async () => {
    generateContent.mockResolvedValueOnce({ text: "plain words" });
    const client = createGeminiClient({ apiKey: "test-secret", model: "custom-model" });

    await expect(client.generate("hello")).resolves.toBe("plain words");
    expect(generateContent.mock.calls[0][0].model).toBe("custom-model");
  });

  it("builds the SDK client once and reuses it", async () => {
    generateContent.mockResolvedValue({ text: "ok" });
    const client = createGeminiClient({ apiKey: "test-secret" });

    await client.generate("first");
    await client.generate("second");

    expect(constructed).toHaveLength(1);
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it("records why a reply failed validation", async () => {
    generateContent.mockResolvedValueOnce({ text: '{"answer": 42}' });
    const client = createGeminiClient({ apiKey: "test-secret" });

    await expect(client.generate("q", ReplySchema)).rejects.toThrow();
    const debug = client.getDebugInfo();
    expect(debug.validated).toBe(false);
    expect(debug.fallbackReason).toMatch(/^Validation failed: /);
    expect(debug.rawPreview).toBe('{"answer": 42}');
  });

  it("keeps the transport error as the fallback reason", async () => {
    generateContent.mockRejectedValueOnce(new Error("quota exceeded"));
    const client = createGeminiClient({ apiKey: "test-secret" });

    await expect(client.generate("q", ReplySchema)).rejects.toThrow("quota exceeded");
    expect(client.getDebugInfo().fallbackReason).toBe("quota exceeded");

    client.resetDebugInfo();
    expect(client.getDebugInfo()).toEqual({ called: false, provider: "none", validated: false });
  });
});

describe("createNullLLMClient", () => {
  it("always refuses with its reason", async () => {
    const client = createNullLLMClient("API key not configured (GEMINI_API_KEY)");

    expect(client.isAvailable()).toBe(false);
    await expect(client.generate("q")).rejects.toThrow("API key not configured (GEMINI_API_KEY)");
    expect(client.getDebugInfo()).toEqual({
      called: true,
      provider: "none",
      validated: false,
      fallbackReason: "API key not configured (GEMINI_API_KEY)",
    });
  });
});
