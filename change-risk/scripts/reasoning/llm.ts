import { createHash } from "node:crypto";
import { z } from "zod";
import type { ReasoningAudit } from "../types";

export type LLMProvider = "openai" | "anthropic" | "gemini" | "qwen" | "deepseek";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ProviderRuntimeConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

const PROVIDERS: readonly LLMProvider[] = ["openai", "anthropic", "gemini", "qwen", "deepseek"];

const DEFAULTS: Record<LLMProvider, { keyEnv: string; baseEnv: string; modelEnv: string; baseUrl: string; model: string }> = {
  openai: {
    keyEnv: "OPENAI_API_KEY",
    baseEnv: "OPENAI_BASE_URL",
    modelEnv: "OPENAI_MODEL",
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  anthropic: {
    keyEnv: "ANTHROPIC_API_KEY",
    baseEnv: "ANTHROPIC_BASE_URL",
    modelEnv: "ANTHROPIC_MODEL",
    baseUrl: "https://api.anthropic.com/v1",
    model: "claude-3-5-sonnet-latest",
  },
  gemini: {
    keyEnv: "GEMINI_API_KEY",
    baseEnv: "GEMINI_BASE_URL",
    modelEnv: "GEMINI_MODEL",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta",
    model: "gemini-1.5-pro",
  },
  qwen: {
    keyEnv: "QWEN_API_KEY",
    baseEnv: "QWEN_BASE_URL",
    modelEnv: "QWEN_MODEL",
    baseUrl: "https://dashscope.aliyuncs.com/compatible-mode/v1",
    model: "qwen-plus",
  },
  deepseek: {
    keyEnv: "DEEPSEEK_API_KEY",
    baseEnv: "DEEPSEEK_BASE_URL",
    modelEnv: "DEEPSEEK_MODEL",
    baseUrl: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
};

function isProvider(value: string | null | undefined): value is LLMProvider {
  return PROVIDERS.some((provider) => provider === value);
}

export function resolveProvider(input?: string | null, env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const envProvider = env.LLM_PROVIDER?.toLowerCase();
  if (isProvider(envProvider)) return envProvider;
  return isProvider(input) ? input : "openai";
}

/** Returns null when the provider's API key is missing; callers run degraded. */
export function resolveProviderRuntimeConfig(
  params: { provider?: string | null; model?: string | null; temperature?: number },
  env: NodeJS.ProcessEnv = process.env,
): ProviderRuntimeConfig | null {
  const provider = resolveProvider(params.provider, env);
  const defaults = DEFAULTS[provider];
  const apiKey = env[defaults.keyEnv];
  if (!apiKey) return null;
  return {
    provider,
    apiKey,
    baseUrl: (env[defaults.baseEnv] ?? defaults.baseUrl).replace(/\/+$/, ""),
    model: env[defaults.modelEnv] ?? env.LLM_MODEL ?? params.model ?? defaults.model,
    temperature: params.temperature ?? 0.1,
  };
}

const OpenAIResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.unknown() }).optional() }))
    .optional(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
});

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
      }),
    )
    .optional(),
});

function extractContent(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    return raw
      .map((item: unknown) => {
        if (typeof item === "string") return item;
        if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
          return item.text;
        }
        return "";
      })
      .join("");
  }
  return "";
}

async function postJson(fetchImpl: FetchLike, url: string, init: RequestInit): Promise<unknown> {
  const response = await fetchImpl(url, init);
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`LLM HTTP ${response.status} ${response.statusText}: ${body.slice(0, 300)}`);
  }
  return response.json();
}

async function callProvider(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  fetchImpl: FetchLike,
  signal?: AbortSignal,
): Promise<string> {
  let content = "";
  if (config.provider === "anthropic") {
    const data = AnthropicResponseSchema.parse(
      await postJson(fetchImpl, `${config.baseUrl}/messages`, {
        method: "POST",
        signal,
        headers: {
          "x-api-key": config.apiKey,
          "anthropic-version": "2023-06-01",
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: config.model,
          max_tokens: 2048,
          temperature: config.temperature,
          system: `${systemPrompt}\nOutput JSON only.`,
          messages: [{ role: "user", content: userPrompt }],
        }),
      }),
    );
    content = (data.content ?? [])
      .filter((part) => part.type === "text")
      .map((part) => part.text ?? "")
      .join("");
  } else if (config.provider === "gemini") {
    const url = `${config.baseUrl}/models/${encodeURIComponent(config.model)}:generateContent?key=${encodeURIComponent(config.apiKey)}`;
    const data = GeminiResponseSchema.parse(
      await postJson(fetchImpl, url, {
        method: "POST",
        signal,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          contents: [{ role: "user", parts: [{ text: `${systemPrompt}\n\n${userPrompt}\n\nOutput JSON only.` }] }],
          generationConfig: { temperature: config.temperature },
        }),
      }),
    );
    content = (data.candidates?.[0]?.content?.parts ?? []).map((part) => part.text ?? "").join("");
  } else {
    const data = OpenAIResponseSchema.parse(
      await postJson(fetchImpl, `${config.baseUrl}/chat/completions`, {
        method: "POST",
        signal,
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: config.model,
          temperature: config.temperature,
          messages: [
            { role: "system", content: `${systemPrompt}\nOutput JSON only.` },
            { role: "user", content: userPrompt },
          ],
        }),
      }),
    );
    content = extractContent(data.choices?.[0]?.message?.content ?? "");
  }
  if (!content) throw new Error("LLM returned empty content.");
  return content;
}

export interface ChatJSONParams<T> {
  config: ProviderRuntimeConfig;
  systemPrompt: string;
  userPrompt: string;
  parse: (content: string) => T;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  audit?: {
    run_id: string;
    file?: string | null;
    hop?: number;
    role: ReasoningAudit["role"];
    strict: boolean;
    onAudit?: (audit: ReasoningAudit) => void;
  };
}

/** One provider round trip; `parse` runs inside so the audit records whether the output was usable. */
export async function chatJSON<T>(params: ChatJSONParams<T>): Promise<T> {
  const startedAt = Date.now();
  const promptHash = createHash("sha256")
    .update(params.systemPrompt)
    .update("\n\n")
    .update(params.userPrompt)
    .digest("hex");
  const promptChars = params.systemPrompt.length + params.userPrompt.length;
  let completionChars = 0;

  const emitAudit = (ok: boolean, errorMessage?: string) => {
    if (!params.audit?.onAudit) return;
    params.audit.onAudit({
      ts: new Date().toISOString(),
      run_id: params.audit.run_id,
      file: params.audit.file ?? null,
      hop: params.audit.hop,
      role: params.audit.role,
      model: params.config.model,
      prompt_hash: promptHash,
      strict: params.audit.strict,
      ok,
      duration_ms: Date.now() - startedAt,
      prompt_chars: promptChars,
      completion_chars: completionChars,
      ...(errorMessage ? { error: errorMessage.slice(0, 200) } : {}),
    });
  };

  try {
    const content = await callProvider(
      params.config,
      params.systemPrompt,
      params.userPrompt,
      params.fetchImpl ?? fetch,
      params.signal,
    );
    completionChars = content.length;
    const parsed = params.parse(content);
    emitAudit(true);
    return parsed;
  } catch (error) {
    emitAudit(false, error instanceof Error ? error.message : String(error));
    throw error;
  }
}
