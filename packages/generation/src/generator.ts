import { REFUSAL_TEXT, createLogger } from "@citeqa/core";
import type { AnswerMode, QueryType, RetrievedPassage } from "@citeqa/core";
import { buildPrompt, type Prompt } from "./prompt.js";
import { generateWithOllama } from "./ollama.js";

const log = createLogger("generation");

/** Black-box text model. Its output is untrusted. */
export interface TextGenerator {
  readonly model: string;
  generate(input: Prompt): Promise<string>;
}

export type OllamaGeneratorOptions = {
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
};

export class OllamaGenerator implements TextGenerator {
  readonly model: string;

  constructor(private readonly opts: OllamaGeneratorOptions) {
    this.model = opts.model;
  }

  generate(input: Prompt): Promise<string> {
    return generateWithOllama({ ...this.opts, ...input });
  }
}

export class AnswerGenerator {
  constructor(private readonly model: TextGenerator) {}

  /**
   * Raw answer text for the given passages, citing them as [S1]..[Sn] in
   * the order given. Never calls the model without passages.
   */
  async generate(params: {
    question: string;
    queryType: QueryType;
    mode: AnswerMode;
    passages: RetrievedPassage[];
  }): Promise<string> {
    if (params.passages.length === 0) return REFUSAL_TEXT;

    const prompt = buildPrompt(params);
    const started = Date.now();
    const raw = await this.model.generate(prompt);

    log.info("generated", {
      model: this.model.model,
      mode: params.mode,
      passages: params.passages.length,
      chars: raw.length,
      ms: Date.now() - started,
    });
    return raw;
  }
}
