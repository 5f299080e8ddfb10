import { REFUSAL_TEXT } from "@citeqa/core";
import type { AnswerMode, QueryType, RetrievedPassage } from "@citeqa/core";

export type Prompt = {
  system: string;
  prompt: string;
};

export type RequestKind = "practical" | "comparison" | "analytical" | "informational";
export type Complexity = "basic" | "advanced" | "expert";

/** Marker for the passage at `index` (0-based) of the list sent to the model. */
export function citationMarker(index: number): string {
  return `[S${index + 1}]`;
}

export const SYSTEM_PROMPT = [
  "You are a corporate assistant for sales and technical teams.",
  "Answer ONLY using the numbered sources in the context. Do not use outside knowledge.",
  "End every sentence that states a fact with the marker of the source that supports it, like [S1] or [S1, S2].",
  "Use only source numbers that appear in the context.",
  `If the sources do not contain the answer, reply with exactly: ${REFUSAL_TEXT}`,
  "Do not invent facts, numbers, features or plans. Do not add a sources section or code blocks.",
  "Answer in the language of the question.",
].join("\n");

const MODE_GUIDANCE: Record<AnswerMode, string> = {
  brief: ["- Keep the answer to 2-4 short sentences.", "- Give the direct conclusion and one key piece of evidence."].join(
    "\n"
  ),
  standard: [
    "- Give a balanced answer: conclusion, short explanation, practical note.",
    "- Avoid unnecessary verbosity.",
  ].join("\n"),
  detailed: [
    "- Give a layered explanation: conclusion, mechanism, practical implications.",
    "- Use bullet points, one fact per bullet, each bullet ending with its marker.",
    "- Include limitations and edge cases when the sources mention them.",
  ].join("\n"),
};

export function detectRequestKind(question: string): RequestKind {
  const q = question.toLowerCase();
  const hasAny = (words: string[]) => words.some((w) => q.includes(w));

  if (hasAny(["how ", "how do", "step", "configure", "set up", "install"])) return "practical";
  if (hasAny(["compare", "difference", "versus", " vs "])) return "comparison";
  if (hasAny(["why", "reason", "cause"])) return "analytical";
  return "informational";
}

export function detectComplexity(question: string): Complexity {
  const words = question.trim().split(/\s+/).filter(Boolean).length;
  if (words <= 6) return "basic";
  if (words <= 16) return "advanced";
  return "expert";
}

export function formatContext(passages: RetrievedPassage[]): string {
  return passages
    .map((p, i) => {
      const md = p.chunk.metadata;
      return `### ${citationMarker(i)} ${p.documentName} (version ${md.version}, part ${md.ordinal + 1})\nSimilarity: ${p.similarity.toFixed(4)}\n\n${p.chunk.text}\n`;
    })
    .join("\n");
}

export function buildPrompt(params: {
  question: string;
  queryType: QueryType;
  mode: AnswerMode;
  passages: RetrievedPassage[];
}): Prompt {
  const { question, queryType, mode, passages } = params;

  const prompt = [
    `Query type: ${queryType}`,
    `Response mode: ${mode}\n`,
    `Mode guidance:\n${MODE_GUIDANCE[mode]}\n`,
    `Question profile:\n- Query kind: ${detectRequestKind(question)}\n- Complexity: ${detectComplexity(question)}\n`,
    `Question:\n${question.trim()}\n`,
    `Context:\n${formatContext(passages)}`,
    "Write the answer. Cite every factual sentence with its source marker, like [S1].",
  ].join("\n");

  return { system: SYSTEM_PROMPT, prompt };
}
