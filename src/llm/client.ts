import OpenAI from "openai";
import { z } from "zod";
import type { AppLogger } from "../logger/index.js";
import { ConfigurationError, describeError } from "../errors.js";

export type OpenAIConfig = {
  apiKey: string;
  baseURL: string;
  model: string;
};

const openAIEnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().default(""),
  OPENAI_BASE_URL: z.string().trim().url().default("https://api.openai.com/v1"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o"),
});

export function loadOpenAIConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OpenAIConfig {
  const parsed = openAIEnvSchema.safeParse({
    OPENAI_API_KEY: env.OPENAI_API_KEY,
    OPENAI_BASE_URL: env.OPENAI_BASE_URL || undefined,
    OPENAI_MODEL: env.OPENAI_MODEL || undefined,
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid OpenAI settings",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  if (!parsed.data.OPENAI_API_KEY) {
    throw new ConfigurationError(
      "Missing OPENAI_API_KEY. Set it in your environment (see .env.example) or run with --offline"
    );
  }

  return {
    apiKey: parsed.data.OPENAI_API_KEY,
    baseURL: parsed.data.OPENAI_BASE_URL.replace(/\/+$/, ""),
    model: parsed.data.OPENAI_MODEL,
  };
}

/**
 * Client for any OpenAI-compatible Chat Completions endpoint; `baseURL` and
 * `model` come from the environment. SDK retries are off: the analyzer owns
 * the retry and timeout policy.
 */
export function createOpenAIClient(cfg: OpenAIConfig): OpenAI {
  return new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL, maxRetries: 0 });
}

export type ChatCompletionReply = {
  choices: Array<{ message: { content: string | null } }>;
  usage?: OpenAI.CompletionUsage;
};

/** The slice of the OpenAI client that `chatJson` calls; an `OpenAI` instance satisfies it. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletionReply>;
    };
  };
};

export type ChatJsonOptions = {
  logger: AppLogger;
  client: ChatCompletionsClient;
  model: string;
  messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[];
  temperature?: number;
  maxTokens?: number;
  /** Log label only, never the prompt text: e.g. `coverage.financial`. */
  purpose: string;
  signal?: AbortSignal;
};

/**
 * Calls Chat Completions and returns the parsed JSON body of the reply.
 *
 * Flow:
 * - first call sets `response_format: { type: "json_object" }`;
 * - if that call fails or its reply does not parse, one plain call follows and
 *   the outermost `{...}` is cut out of its reply;
 * - a reply that still does not parse throws `SyntaxError`.
 *
 * Constraints:
 * - once `signal` has aborted, the error is rethrown and no second call is made;
 * - logs carry `purpose`, duration and token usage, never message text.
 */
export async function chatJson(opts: ChatJsonOptions): Promise<{ rawText: string; json: unknown }> {
  const t0 = Date.now();
  const log = opts.logger;

  const basePayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
    model: opts.model,
    messages: opts.messages,
    temperature: opts.temperature ?? 0.2,
    max_tokens: opts.maxTokens,
  };

  try {
    const resp = await opts.client.chat.completions.create(
      { ...basePayload, response_format: { type: "json_object" } },
      { signal: opts.signal }
    );
    const rawText = resp.choices[0]?.message?.content ?? "";
    log.info("LLM chatJson ok", {
      purpose: opts.purpose,
      ms: Date.now() - t0,
      usage: resp.usage,
    });
    return { rawText, json: parseJsonReply(rawText) };
  } catch (err) {
    if (opts.signal?.aborted) throw err;
    log.warn("LLM chatJson response_format failed; fallback", {
      purpose: opts.purpose,
      ms: Date.now() - t0,
      error: describeError(err),
    });
  }

  const resp2 = await opts.client.chat.completions.create(basePayload, { signal: opts.signal });
  const rawText2 = resp2.choices[0]?.message?.content ?? "";
  log.info("LLM chatJson ok (fallback)", {
    purpose: opts.purpose,
    ms: Date.now() - t0,
    usage: resp2.usage,
  });
  return { rawText: rawText2, json: parseJsonReply(rawText2) };
}

/** Accepts a reply with a little prose around the JSON object. */
export function parseJsonReply(raw: string): unknown {
  const trimmed = raw.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    return JSON.parse(extractFirstJsonObject(trimmed));
  }
}

function extractFirstJsonObject(text: string): string {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last === -1 || last <= first) {
    throw new SyntaxError("LLM output is not valid JSON");
  }
  return text.slice(first, last + 1);
}
