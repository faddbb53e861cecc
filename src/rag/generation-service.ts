import { z } from "zod";
import { GenerationError, RagError, errorMessage, isTransientStatus } from "./errors.js";
import { TimeoutError, withTimeout } from "./retry.js";
import type { ChatTurn } from "./types.js";

export interface GenerationRequest {
  instruction: string;
  /** Text the model must work from: retrieved excerpts or a raw page. */
  context: string;
  /** The user's question; absent for page transforms. */
  query?: string;
  history?: ChatTurn[];
}

export interface TextGenerator {
  readonly model: string;
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

interface ApiMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

/** Lays out a request as chat messages: system, history, then the user turn. */
export function buildMessages(request: GenerationRequest): ApiMessage[] {
  if (request.query === undefined) {
    return [
      { role: "system", content: request.instruction },
      { role: "user", content: request.context },
    ];
  }
  return [
    { role: "system", content: `${request.instruction}\n\n${request.context}` },
    ...(request.history ?? []).map((turn) => ({ role: turn.role, content: turn.content })),
    { role: "user", content: request.query },
  ];
}

export interface ChatCompletionGeneratorOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

/** Non-streaming OpenAI-compatible `/chat/completions` client. */
export class ChatCompletionGenerator implements TextGenerator {
  readonly model: string;
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatCompletionGeneratorOptions) {
    this.model = options.model;
    this.url = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    try {
      return await withTimeout(this.timeoutMs, signal, (requestSignal) =>
        this.complete(buildMessages(request), requestSignal),
      );
    } catch (err) {
      if (err instanceof RagError) throw err;
      if (err instanceof TimeoutError) {
        throw new GenerationError(`Generation request ${err.message}`, true, undefined, { cause: err });
      }
      throw new GenerationError(`Generation request failed: ${errorMessage(err)}`, true, undefined, {
        cause: err,
      });
    }
  }

  private async complete(messages: ApiMessage[], signal: AbortSignal): Promise<string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;

    const res = await this.fetchImpl(this.url, {
      method: "POST",
      headers,
      body: JSON.stringify({ model: this.model, messages, stream: false }),
      signal,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new GenerationError(`API error (${res.status}): ${text}`, isTransientStatus(res.status), res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new GenerationError("API returned invalid JSON", false, res.status, { cause: err });
    }
    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationError("API response has an unexpected shape", false, res.status, {
        cause: parsed.error,
      });
    }
    const content = parsed.data.choices[0]?.message.content;
    if (!content) throw new GenerationError("API returned an empty reply", false, res.status);
    return content.trim();
  }
}
