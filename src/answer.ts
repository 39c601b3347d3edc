import OpenAI from "openai";
import { withTimeout } from "./async";
import type { Embedder } from "./embeddings";
import { AnswerUnavailableError, RagError } from "./errors";
import { retrieveScored } from "./retriever";
import type { CancelOptions, ScoredChunk } from "./types";
import type { VectorIndex } from "./vector-index";

/** Generative model that answers a question from retrieved context. */
export interface AnswerGenerator {
  answer(question: string, context: readonly string[], opts?: CancelOptions): Promise<string>;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/**
 * The slice of the OpenAI client used for chat completions. The real `OpenAI`
 * instance satisfies it; tests pass a stand-in.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; temperature?: number },
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export const SYSTEM_PROMPT =
  "Answer the question using only the numbered context passages. " +
  "If the passages do not contain the answer, say that you don't know.";

/** System + user messages; passages are numbered from 1 in ranked order. */
export function buildMessages(question: string, context: readonly string[]): ChatMessage[] {
  const passages = context.map((text, i) => `[${i + 1}] ${text}`).join("\n\n");
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: `Context:\n${passages}\n\nQuestion: ${question}` },
  ];
}

export interface OpenAIAnswerGeneratorOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** Deadline for the single attempt (default 60000). */
  timeoutMs?: number;
  temperature?: number;
  client?: ChatClient;
}

/**
 * {@link AnswerGenerator} over OpenAI chat completions. One bounded attempt:
 * no retries, and a {@link TimeoutError} once the deadline passes.
 */
export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;

  public constructor(opts: OpenAIAnswerGeneratorOptions) {
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.temperature = opts.temperature ?? 0.1;
    this.client =
      opts.client ?? new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL, maxRetries: 0 });
  }

  public async answer(
    question: string,
    context: readonly string[],
    opts: CancelOptions = {},
  ): Promise<string> {
    const response = await withTimeout(
      this.timeoutMs,
      `Answer generation (model ${this.model})`,
      (signal) =>
        this.client.chat.completions.create(
          {
            model: this.model,
            messages: buildMessages(question, context),
            temperature: this.temperature,
          },
          { signal },
        ),
      opts.signal,
    );
    return response.choices[0]?.message.content ?? "";
  }
}

export interface AskParams extends CancelOptions {
  index: VectorIndex;
  embedder: Embedder;
  generator: AnswerGenerator;
  question: string;
  k: number;
}

export interface AskResult {
  answer: string;
  /** The retrieved context, closest first. */
  sources: ScoredChunk[];
}

/** Retrieve the `k` nearest chunks for `question`, then ask the generator. */
export async function askQuestion(params: AskParams): Promise<AskResult> {
  const { index, embedder, generator, question, k, signal } = params;
  const sources = await retrieveScored(index, embedder, question, k, { signal });
  try {
    const answer = await generator.answer(
      question,
      sources.map((s) => s.chunk.text),
      { signal },
    );
    return { answer, sources };
  } catch (e) {
    if (e instanceof RagError) throw e;
    throw new AnswerUnavailableError("Answer generation failed", e);
  }
}
