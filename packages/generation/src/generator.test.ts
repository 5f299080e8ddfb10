import { afterEach, describe, it, expect, vi } from "vitest";
import { GenerationUnavailableError, REFUSAL_TEXT } from "@citeqa/core";
import type { RetrievedPassage } from "@citeqa/core";
import { AnswerGenerator, OllamaGenerator, type TextGenerator } from "./generator.js";
import type { Prompt } from "./prompt.js";

function passage(text: string, similarity: number): RetrievedPassage {
  return {
    chunk: {
      id: "c1",
      text,
      metadata: { documentId: "d1", documentName: "Manual v1", version: "v1", ordinal: 0, contentHash: "h" },
    },
    similarity,
    documentName: "Manual v1",
  };
}

class ScriptedGenerator implements TextGenerator {
  readonly model = "scripted";
  readonly prompts: Prompt[] = [];

  constructor(private readonly reply: string) {}

  async generate(input: Prompt): Promise<string> {
    this.prompts.push(input);
    return this.reply;
  }
}

describe("AnswerGenerator", () => {
  it("returns the refusal text without calling the model when there are no passages", async () => {
    const model = new ScriptedGenerator("should not be used [S1]");
    const generator = new AnswerGenerator(model);

    await expect(
      generator.generate({ question: "What is the warranty?", queryType: "sales", mode: "standard", passages: [] })
    ).resolves.toBe(REFUSAL_TEXT);
    expect(model.prompts).toHaveLength(0);
  });

  it("passes the built prompt to the model and returns its raw text", async () => {
    const model = new ScriptedGenerator("The warranty lasts two years. [S1]");
    const generator = new AnswerGenerator(model);

    const raw = await generator.generate({
      question: "What is the warranty?",
      queryType: "sales",
      mode: "brief",
      passages: [passage("The warranty lasts two years.", 0.92)],
    });

    expect(raw).toBe("The warranty lasts two years. [S1]");
    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]?.prompt).toContain("### [S1] Manual v1 (version v1, part 1)");
  });
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("OllamaGenerator", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const opts = { baseUrl: "http://ollama.test", model: "gen-test", temperature: 0.2, timeoutMs: 1000 };

  it("posts a non-streaming request with the temperature", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ response: "  Answer. [S1]\n" }));
    vi.stubGlobal("fetch", fetchMock);

    const text = await new OllamaGenerator(opts).generate({ system: "sys", prompt: "p" });

    expect(text).toBe("Answer. [S1]");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://ollama.test/api/generate");
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual({
      model: "gen-test",
      system: "sys",
      prompt: "p",
      stream: false,
      options: { temperature: 0.2 },
    });
  });

  it("raises GenerationUnavailableError on a non-2xx response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("model not found", { status: 404, statusText: "Not Found" })));

    await expect(new OllamaGenerator(opts).generate({ system: "s", prompt: "p" })).rejects.toBeInstanceOf(
      GenerationUnavailableError
    );
  });

  it("raises GenerationUnavailableError when the model is unreachable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(new TypeError("fetch failed"))));

    await expect(new OllamaGenerator(opts).generate({ system: "s", prompt: "p" })).rejects.toThrow(
      "Ollama generation unreachable at http://ollama.test"
    );
  });

  it("raises GenerationUnavailableError on an empty response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ response: "   " })));

    await expect(new OllamaGenerator(opts).generate({ system: "s", prompt: "p" })).rejects.toThrow(
      "Ollama returned an empty response."
    );
  });
});
