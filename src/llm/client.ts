// src/llm/client.ts — Role invoker: HTTP client for the text-generation service
// One request per invocation; every failure leaves here as a classified UpstreamError.

import { z } from "zod";
import type { LLMProvider, ResolvedConfig } from "../types.js";
import { CancelledError, UpstreamError, type UpstreamErrorKind } from "../types.js";
import type { RoleName } from "../templates/roles.js";

export interface RoleInvocation {
  role: RoleName;
  /** Persona prompt of the role. */
  system: string;
  instruction: string;
  payload: string;
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface InvocationResult {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface RoleInvoker {
  invoke(call: RoleInvocation): Promise<InvocationResult>;
}

const DEFAULT_ENDPOINTS: Record<LLMProvider, string | undefined> = {
  anthropic: "https://api.anthropic.com",
  openai: "https://api.openai.com",
  "azure-openai": undefined,
};

const RETRYABLE: readonly UpstreamErrorKind[] = ["RateLimited", "Timeout", "ModelUnavailable"];

const AnthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
  usage: z
    .object({ input_tokens: z.number().optional(), output_tokens: z.number().optional() })
    .optional(),
});

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({ message: z.object({ content: z.string().nullable().optional() }) }),
  ),
  usage: z
    .object({ prompt_tokens: z.number().optional(), completion_tokens: z.number().optional() })
    .optional(),
});

interface PreparedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * fetch-based invoker for Anthropic, OpenAI and Azure OpenAI.
 */
export class HttpRoleInvoker implements RoleInvoker {
  constructor(private readonly llm: ResolvedConfig["llm"]) {}

  async invoke(call: RoleInvocation): Promise<InvocationResult> {
    const attempts = Math.max(0, this.llm.retries) + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.invokeOnce(call);
      } catch (err) {
        lastError = err;
        const retryable = err instanceof UpstreamError && RETRYABLE.includes(err.kind);
        if (!retryable || attempt === attempts) throw err;
        await delay(this.llm.retryDelayMs, call.signal);
      }
    }
    throw lastError;
  }

  private async invokeOnce(call: RoleInvocation): Promise<InvocationResult> {
    if (!this.llm.apiKey) {
      throw new UpstreamError(
        "AuthError",
        "No API key configured. Set DOCSMITH_API_KEY (or the provider's own key variable).",
      );
    }
    if (call.signal?.aborted) throw new CancelledError();

    const request = this.prepare(call, this.llm.apiKey);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.llm.requestTimeoutMs);
    const onCancel = () => controller.abort();
    call.signal?.addEventListener("abort", onCancel, { once: true });

    try {
      let response: Response;
      try {
        response = await fetch(request.url, {
          method: "POST",
          signal: controller.signal,
          headers: { "Content-Type": "application/json", ...request.headers },
          body: JSON.stringify(request.body),
        });
      } catch (err) {
        if (timedOut) {
          throw new UpstreamError("Timeout", `Request timed out after ${this.llm.requestTimeoutMs}ms`);
        }
        if (call.signal?.aborted) throw new CancelledError();
        const msg = err instanceof Error ? err.message : String(err);
        throw new UpstreamError("ModelUnavailable", `Service unreachable: ${msg}`);
      }

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        // Error bodies can echo request data; keep them short
        const safeBody = body.slice(0, 200);
        throw new UpstreamError(
          classifyStatus(response.status),
          `Service returned ${response.status}: ${safeBody}`,
          response.status,
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch {
        if (timedOut) {
          throw new UpstreamError("Timeout", `Request timed out after ${this.llm.requestTimeoutMs}ms`);
        }
        throw new UpstreamError("MalformedResponse", "Service response is not valid JSON");
      }
      return this.readResult(data);
    } finally {
      clearTimeout(timer);
      call.signal?.removeEventListener("abort", onCancel);
    }
  }

  private prepare(call: RoleInvocation, apiKey: string): PreparedRequest {
    const endpoint = (this.llm.endpoint ?? DEFAULT_ENDPOINTS[this.llm.provider] ?? "").replace(/\/+$/, "");
    const userContent = `<instructions>\n${call.instruction}\n</instructions>\n\n${call.payload}`;

    switch (this.llm.provider) {
      case "anthropic":
        return {
          url: `${endpoint}/v1/messages`,
          headers: { "x-api-key": apiKey, "anthropic-version": "2023-06-01" },
          body: {
            model: this.llm.model,
            max_tokens: call.maxOutputTokens,
            system: call.system,
            messages: [{ role: "user", content: userContent }],
            temperature: call.temperature,
          },
        };
      case "openai":
        return {
          url: `${endpoint}/v1/chat/completions`,
          headers: { Authorization: `Bearer ${apiKey}` },
          body: chatBody(this.llm.model, call, userContent),
        };
      case "azure-openai": {
        if (!endpoint) {
          throw new UpstreamError("ModelUnavailable", "azure-openai requires llm.endpoint (DOCSMITH_ENDPOINT)");
        }
        const deployment = encodeURIComponent(this.llm.deployment ?? this.llm.model);
        const version = encodeURIComponent(this.llm.apiVersion);
        return {
          url: `${endpoint}/openai/deployments/${deployment}/chat/completions?api-version=${version}`,
          headers: { "api-key": apiKey },
          body: chatBody(undefined, call, userContent),
        };
      }
    }
  }

  private readResult(data: unknown): InvocationResult {
    if (this.llm.provider === "anthropic") {
      const parsed = AnthropicResponseSchema.safeParse(data);
      const text = parsed.success
        ? parsed.data.content.find((c) => typeof c.text === "string")?.text
        : undefined;
      if (!parsed.success || !text) {
        throw new UpstreamError("MalformedResponse", "Service response missing content text");
      }
      return {
        text,
        model: parsed.data.model ?? this.llm.model,
        inputTokens: parsed.data.usage?.input_tokens ?? 0,
        outputTokens: parsed.data.usage?.output_tokens ?? 0,
      };
    }

    const parsed = ChatCompletionResponseSchema.safeParse(data);
    const text = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (!parsed.success || !text) {
      throw new UpstreamError("MalformedResponse", "Service response missing message content");
    }
    return {
      text,
      model: parsed.data.model ?? this.llm.deployment ?? this.llm.model,
      inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
      outputTokens: parsed.data.usage?.completion_tokens ?? 0,
    };
  }
}

function chatBody(model: string | undefined, call: RoleInvocation, userContent: string): unknown {
  return {
    ...(model ? { model } : {}),
    max_tokens: call.maxOutputTokens,
    temperature: call.temperature,
    messages: [
      { role: "system", content: call.system },
      { role: "user", content: userContent },
    ],
  };
}

export function classifyStatus(status: number): UpstreamErrorKind {
  if (status === 401 || status === 403) return "AuthError";
  if (status === 429) return "RateLimited";
  if (status === 408) return "Timeout";
  return "ModelUnavailable";
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
