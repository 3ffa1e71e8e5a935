// src/llm/client.ts — HTTP client for the generative collaborator
// Anthropic Messages API over fetch, one retry, 120s timeout.

import type { ResolvedConfig } from "../types.js";
import { LLMError } from "../types.js";
import { isRecord } from "../privacy-guard.js";

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * The generative reasoning collaborator. Every agent treats it as optional
 * and falls back to a deterministic strategy when a call rejects.
 */
export interface GenerativeClient {
  chatText(system: string, user: string, options?: ChatOptions): Promise<string>;
  chatJson(system: string, user: string, options?: ChatOptions): Promise<Record<string, unknown>>;
}

const RETRY_DELAY_MS = 2000;
const REQUEST_TIMEOUT_MS = 120_000;

export function createGenerativeClient(llmConfig: ResolvedConfig["llm"]): GenerativeClient {
  const chatText = (system: string, user: string, options: ChatOptions = {}) =>
    callLLMWithRetry(system, user, llmConfig, options);
  return {
    chatText,
    async chatJson(system, user, options) {
      const text = await chatText(
        `${system}\n\nRespond with a single JSON object and nothing else.`,
        user,
        options,
      );
      return parseJsonResponse(text);
    },
  };
}

/**
 * Parse a structured reply. Models often wrap JSON in a Markdown fence.
 * Unparseable or non-object output becomes { raw, parseError } rather than
 * an exception, so callers decide whether that is fatal.
 */
export function parseJsonResponse(text: string): Record<string, unknown> {
  const fence = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  const body = (fence ? fence[1] : text).trim();
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) return parsed;
    return { raw: text, parseError: "Response is not a JSON object" };
  } catch (err) {
    return { raw: text, parseError: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Call the API with automatic retry (1 retry after 2s delay).
 */
async function callLLMWithRetry(
  systemPrompt: string,
  userPrompt: string,
  llmConfig: ResolvedConfig["llm"],
  options: ChatOptions,
): Promise<string> {
  if (!llmConfig.apiKey) {
    throw new LLMError("No API key configured. Set ANTHROPIC_API_KEY.");
  }
  const apiKey = llmConfig.apiKey;
  try {
    return await callLLM(systemPrompt, userPrompt, llmConfig, apiKey, options);
  } catch (err) {
    // Client errors will not improve on retry
    if (err instanceof LLMError && err.statusCode !== undefined && err.statusCode < 500 && err.statusCode !== 429) {
      throw err;
    }
    await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
    try {
      return await callLLM(systemPrompt, userPrompt, llmConfig, apiKey, options);
    } catch (retryErr) {
      throw new LLMError(
        `LLM API failed after retry: ${retryErr instanceof Error ? retryErr.message : String(retryErr)}`,
      );
    }
  }
}

async function callLLM(
  systemPrompt: string,
  userPrompt: string,
  llmConfig: ResolvedConfig["llm"],
  apiKey: string,
  options: ChatOptions,
): Promise<string> {
  const baseUrl = llmConfig.baseUrl ?? "https://api.anthropic.com";
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  try {
    const response = await fetch(`${baseUrl}/v1/messages`, {
      method: "POST",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        "x-api-key": apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: llmConfig.model,
        max_tokens: options.maxTokens ?? llmConfig.maxOutputTokens,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
        temperature: options.temperature ?? 0,
      }),
    });

    clearTimeout(timer);

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      // Truncated so error bodies do not leak into logs
      throw new LLMError(
        `LLM API returned ${response.status}: ${body.slice(0, 200)}`,
        response.status,
      );
    }

    const text = extractText(await response.json());
    if (!text) {
      throw new LLMError("LLM response missing content text");
    }
    return text;
  } catch (err) {
    clearTimeout(timer);
    if (err instanceof LLMError) throw err;
    if (err instanceof Error && err.name === "AbortError") {
      throw new LLMError(`LLM API request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
    }
    throw err;
  }
}

function extractText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.content)) return undefined;
  for (const block of data.content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
      return block.text;
    }
  }
  return undefined;
}
