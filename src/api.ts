import { config } from "./config.js";
import { ApiError } from "./errors.js";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export interface Backend {
  complete(messages: readonly ChatMessage[], signal?: AbortSignal): Promise<string>;
  /** Streams text deltas to `onTextDelta` and resolves with the full response. */
  stream(
    messages: readonly ChatMessage[],
    onTextDelta: (delta: string) => void,
    signal?: AbortSignal
  ): Promise<string>;
}

const MAX_ATTEMPTS = 3;
const BACKOFF_MS = 1_000;

type StreamChunk = { done: true } | { done: false; delta: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function firstChoice(payload: unknown): Record<string, unknown> | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return undefined;
  const choice: unknown = payload.choices[0];
  return isRecord(choice) ? choice : undefined;
}

/** One SSE line of a chat completion stream; null for comments, blanks and junk. */
export function parseStreamChunk(line: string): StreamChunk | null {
  if (!line.startsWith("data: ")) return null;
  const data = line.slice(6).trim();
  if (data === "[DONE]") return { done: true };
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch {
    return null;
  }
  const delta = firstChoice(payload)?.delta;
  if (!isRecord(delta) || typeof delta.content !== "string") return { done: false, delta: "" };
  return { done: false, delta: delta.content };
}

export function extractCompletionText(payload: unknown): string {
  const message = firstChoice(payload)?.message;
  if (!isRecord(message) || typeof message.content !== "string") return "";
  return message.content;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(t);
      reject(signal?.reason);
    };
    const t = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type OpenRouterOptions = {
  apiKey: string;
  model: string;
  url?: string;
  fetchImpl?: typeof fetch;
  backoffMs?: number;
};

export class OpenRouterBackend implements Backend {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly backoffMs: number;

  constructor(private readonly options: OpenRouterOptions) {
    this.url = options.url ?? config.chatCompletionsUrl;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.backoffMs = options.backoffMs ?? BACKOFF_MS;
  }

  private async post(messages: readonly ChatMessage[], stream: boolean, signal?: AbortSignal): Promise<Response> {
    const body = JSON.stringify({ model: this.options.model, max_tokens: 8192, messages, stream });
    for (let attempt = 1; ; attempt++) {
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body,
        signal,
      });
      if (res.ok) return res;
      const err = new ApiError(res.status, `API ${res.status}: ${await res.text()}`);
      if (!err.retryable || attempt >= MAX_ATTEMPTS) throw err;
      await sleep(this.backoffMs * attempt, signal);
    }
  }

  async complete(messages: readonly ChatMessage[], signal?: AbortSignal): Promise<string> {
    const res = await this.post(messages, false, signal);
    const payload: unknown = await res.json();
    return extractCompletionText(payload);
  }

  async stream(
    messages: readonly ChatMessage[],
    onTextDelta: (delta: string) => void,
    signal?: AbortSignal
  ): Promise<string> {
    const res = await this.post(messages, true, signal);
    const reader = res.body?.getReader();
    if (!reader) throw new ApiError(res.status, "No response body");
    const decoder = new TextDecoder();
    let buffer = "";
    let text = "";
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      let batch = "";
      for (const line of lines) {
        const chunk = parseStreamChunk(line.replace(/\r$/, ""));
        if (!chunk) continue;
        if (chunk.done) {
          if (batch) onTextDelta(batch);
          await reader.cancel();
          return text;
        }
        text += chunk.delta;
        batch += chunk.delta;
      }
      if (batch) onTextDelta(batch);
    }
    const tail = parseStreamChunk(buffer.trim());
    if (tail && !tail.done && tail.delta) {
      text += tail.delta;
      onTextDelta(tail.delta);
    }
    return text;
  }
}

export function createOpenRouterBackend(apiKey: string, model: string): Backend {
  return new OpenRouterBackend({ apiKey, model });
}
