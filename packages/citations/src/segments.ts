import { leadingMarkers, stripMarkers } from "./markers.js";

export type Block =
  | { kind: "blank" }
  | { kind: "fence"; text: string }
  | { kind: "heading"; text: string }
  | { kind: "line"; prefix: string; sentences: string[] };

const FENCE = /^\s*(```|~~~)/;
const HEADING = /^#{1,6}\s/;
const LIST_PREFIX = /^(?:[-*+•]|\d+[.)])\s+/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

/**
 * Splits generated text into blocks of claim candidates. A fenced block is a
 * single segment. Other lines are whitespace-collapsed and split into
 * sentences; markers opening a sentence are moved onto the one before it,
 * and a line holding only markers joins the last sentence of the line above.
 */
export function parseBlocks(text: string): Block[] {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const blocks: Block[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";

    if (FENCE.test(line)) {
      const fence = [line];
      while (++i < lines.length) {
        const next = lines[i] ?? "";
        fence.push(next);
        if (FENCE.test(next)) break;
      }
      blocks.push({ kind: "fence", text: fence.join("\n") });
      continue;
    }

    const collapsed = line.replace(/\s+/g, " ").trim();
    if (!collapsed) {
      blocks.push({ kind: "blank" });
      continue;
    }
    const prev = blocks.at(-1);
    const prevSentence = prev?.kind === "line" ? prev.sentences.at(-1) : undefined;
    if (prev?.kind === "line" && prevSentence !== undefined && stripMarkers(collapsed) === "") {
      prev.sentences[prev.sentences.length - 1] = `${prevSentence} ${collapsed}`;
      continue;
    }
    if (HEADING.test(collapsed)) {
      blocks.push({ kind: "heading", text: collapsed });
      continue;
    }

    const prefix = LIST_PREFIX.exec(collapsed)?.[0] ?? "";
    blocks.push({ kind: "line", prefix, sentences: splitSentences(collapsed.slice(prefix.length)) });
  }

  return blocks;
}

export function splitSentences(body: string): string[] {
  const merged: string[] = [];
  for (const part of body.split(SENTENCE_BREAK)) {
    const lead = leadingMarkers(part);
    const last = merged.at(-1);
    if (lead && last !== undefined) {
      merged[merged.length - 1] = `${last} ${lead.trim()}`;
      const rest = part.slice(lead.length).trim();
      if (rest) merged.push(rest);
    } else if (part) {
      merged.push(part);
    }
  }
  return merged;
}
