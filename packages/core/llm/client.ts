/**
 * GEMINI CLIENT
 *
 * One client per planning request. Every call leaves a debug record
 * (provider, latency, token estimate, reply preview, why it fell back)
 * that the orchestrator copies into its debug output.
 */

import type { GoogleGenAI } from "@google/genai";
import type { GenerateOptions, LLMClient, LLMDebugInfo, OutputSchema } from "../skills/types";
import { extractJsonPayload } from "../validation";

export type { LLMClient, LLMDebugInfo, GenerateOptions };

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const PLACEHOLDER_KEY = "your_gemini_api_key_here";
const MISSING_KEY = "API key not configured";
const PREVIEW_LENGTH = 200;

export interface GeminiConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
}

const blankDebugInfo = (): LLMDebugInfo => ({
  called: false,
  provider: "none",
  validated: false,
});

// Rough count: about four characters per token
const estimateTokens = (...texts: Array<string | undefined>): number =>
  Math.ceil(texts.reduce((total, text) => total + (text?.length ?? 0), 0) / 4);

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : "Unknown error");

export function createGeminiClient(config: GeminiConfig = {}): LLMClient {
  const apiKey = config.apiKey && config.apiKey !== PLACEHOLDER_KEY ? config.apiKey : null;
  const baseUrl = config.baseUrl || DEFAULT_GEMINI_BASE_URL;
  const model = config.model || DEFAULT_GEMINI_MODEL;

  let debug = blankDebugInfo();
  let sdk: GoogleGenAI | null = null;

  const markUnavailable = () => {
    debug.provider = "none";
    debug.fallbackReason = MISSING_KEY;
  };

  // The SDK is imported on first use, so keyless runs never load it
  const connect = async (key: string): Promise<GoogleGenAI> => {
    if (!sdk) {
      const { GoogleGenAI } = await import("@google/genai");
      sdk = new GoogleGenAI({ apiKey: key, httpOptions: { apiVersion: "", baseUrl } });
    }
    return sdk;
  };

  const readReply = <T>(content: string, schema?: OutputSchema<T>): T => {
    if (!schema) {
      debug.validated = true;
      return content as T;
    }
    try {
      const value = schema.parse(JSON.parse(extractJsonPayload(content)));
      debug.validated = true;
      return value;
    } catch (error) {
      debug.validated = false;
      debug.fallbackReason = `Validation failed: ${reasonOf(error)}`;
      throw error;
    }
  };

  const generate = async <T = string>(
    prompt: string,
    schema?: OutputSchema<T>,
    options: GenerateOptions = {}
  ): Promise<T> => {
    debug.called = true;
    debug.inputTokensEstimate = estimateTokens(prompt, options.systemInstruction);

    if (!apiKey) {
      markUnavailable();
      throw new Error(`LLM not available: ${MISSING_KEY}`);
    }

    debug.provider = "gemini";
    debug.model = model;
    const startedAt = Date.now();

    let content: string;
    try {
      const ai = await connect(apiKey);
      const response = await ai.models.generateContent({
        model,
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        config: {
          systemInstruction: options.systemInstruction,
          temperature: options.temperature,
          responseMimeType: options.json ? "application/json" : undefined,
        },
      });
      content = response.text || "";
    } catch (error) {
      debug.fallbackReason = reasonOf(error);
      throw error;
    } finally {
      debug.latencyMs = Date.now() - startedAt;
    }

    debug.rawPreview = content.slice(0, PREVIEW_LENGTH);
    return readReply(content, schema);
  };

  return {
    generate,
    isAvailable: () => {
      if (!apiKey) markUnavailable();
      return apiKey !== null;
    },
    getDebugInfo: () => ({ ...debug }),
    resetDebugInfo: () => {
      debug = blankDebugInfo();
    },
  };
}

/** Stand-in when no model is configured: every call fails with `reason`. */
export function createNullLLMClient(reason: string = "LLM disabled"): LLMClient {
  let called = false;
  const snapshot = (): LLMDebugInfo => ({ ...blankDebugInfo(), called, fallbackReason: reason });

  return {
    generate: async <T>(): Promise<T> => {
      called = true;
      throw new Error(reason);
    },
    isAvailable: () => false,
    getDebugInfo: snapshot,
    resetDebugInfo: () => {
      called = false;
    },
  };
}
