import { beforeAll, describe, expect, it } from "vitest";
import {
  askQuestion,
  buildMessages,
  OpenAIAnswerGenerator,
  SYSTEM_PROMPT,
  type AnswerGenerator,
  type ChatClient,
} from "./answer";
import { AnswerUnavailableError, TimeoutError } from "./errors";
import { IndexBuilder } from "./indexer";
import { FakeEmbedder } from "./test-utils/fake-embedder";
import { documentFromText } from "./types";
import type { VectorIndex } from "./vector-index";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ChatBody = Parameters<ChatClient["chat"]["completions"]["create"]>[0];

function fakeChat(reply: (body: ChatBody) => Promise<string | null>) {
  const bodies: ChatBody[] = [];
  const client: ChatClient = {
    chat: {
      completions: {
        create: async (body) => {
          bodies.push(body);
          return { choices: [{ message: { content: await reply(body) } }] };
        },
      },
    },
  };
  return { client, bodies };
}

/** Generator that echoes how many passages it received. */
class RecordingGenerator implements AnswerGenerator {
  public contexts: (readonly string[])[] = [];

  public async answer(question: string, context: readonly string[]): Promise<string> {
    this.contexts.push(context);
    return `${question} (${context.length} passages)`;
  }
}

// ---------------------------------------------------------------------------
// buildMessages / OpenAIAnswerGenerator
// ---------------------------------------------------------------------------

describe("buildMessages", () => {
  it("numbers the passages in ranked order", () => {
    expect(buildMessages("What is X?", ["X is a letter.", "Y follows X."])).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      {
        role: "user",
        content: "Context:\n[1] X is a letter.\n\n[2] Y follows X.\n\nQuestion: What is X?",
      },
    ]);
  });
});

describe("OpenAIAnswerGenerator", () => {
  it("sends one chat completion and returns its text", async () => {
    const { client, bodies } = fakeChat(async () => "forty-two");
    const generator = new OpenAIAnswerGenerator({ model: "gpt-4o-mini", client });
    await expect(generator.answer("q", ["ctx"])).resolves.toBe("forty-two");
    expect(bodies).toEqual([
      { model: "gpt-4o-mini", messages: buildMessages("q", ["ctx"]), temperature: 0.1 },
    ]);
  });

  it("returns an empty answer when the model sends no content", async () => {
    const { client } = fakeChat(async () => null);
    const generator = new OpenAIAnswerGenerator({ model: "m", client });
    await expect(generator.answer("q", [])).resolves.toBe("");
  });

  it("gives up after its deadline", async () => {
    const { client } = fakeChat(() => new Promise<string>(() => {}));
    const generator = new OpenAIAnswerGenerator({ model: "m", client, timeoutMs: 10 });
    await expect(generator.answer("q", [])).rejects.toThrow(
      "Answer generation (model m) timed out after 10ms",
    );
  });
});

// ---------------------------------------------------------------------------
// askQuestion
// ---------------------------------------------------------------------------

describe("askQuestion", () => {
  const embedder = new FakeEmbedder();
  let index: VectorIndex;

  beforeAll(async () => {
    const document = documentFromText("Cats purr.\fDogs bark.\fBirds sing.", "animals.txt");
    index = await new IndexBuilder({ embedder }).build(document, 100, 10);
  });

  it("passes the retrieved chunks to the generator", async () => {
    const generator = new RecordingGenerator();
    const result = await askQuestion({ index, embedder, generator, question: "Dogs bark.", k: 2 });
    expect(result.answer).toBe("Dogs bark. (2 passages)");
    expect(result.sources).toHaveLength(2);
    expect(result.sources[0].chunk.text).toBe("Dogs bark.");
    expect(generator.contexts[0][0]).toBe("Dogs bark.");
  });

  it("wraps generator failures", async () => {
    const generator: AnswerGenerator = {
      answer: async () => {
        throw new Error("quota exceeded");
      },
    };
    const err = await askQuestion({ index, embedder, generator, question: "q", k: 1 }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(AnswerUnavailableError);
    expect(err).toHaveProperty("message", "Answer generation failed: quota exceeded");
  });

  it("passes pipeline errors through", async () => {
    const generator: AnswerGenerator = {
      answer: async () => {
        throw new TimeoutError("Answer generation", 5);
      },
    };
    await expect(
      askQuestion({ index, embedder, generator, question: "q", k: 1 }),
    ).rejects.toBeInstanceOf(TimeoutError);
  });
});
