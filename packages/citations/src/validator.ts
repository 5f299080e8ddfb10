import { REFUSAL_TEXT, type ConfidenceAggregate, type RetrievedPassage } from "@citeqa/core";
import { extractMarkers, stripMarkers } from "./markers.js";
import { parseBlocks } from "./segments.js";

export type Citation = {
  /** 1-based index into the passage list given to the generator. */
  index: number;
  passage: RetrievedPassage;
};

export type ValidationReport = {
  totalClaims: number;
  supportedClaims: number;
  strippedClaims: number;
  /** Out-of-range marker numbers, in order of appearance. */
  invalidMarkers: number[];
};

export type CitationValidation = {
  text: string;
  usedDocuments: string[];
  confidence: number;
  ok: boolean;
  citations: Citation[];
  report: ValidationReport;
};

export type ValidateOptions = {
  aggregate?: ConfidenceAggregate;
};

type Verdict = "structural" | "supported" | "stripped" | "dangling";
type SegmentKind = "sentence" | "heading" | "fence";

const MIN_CLAIM_WORDS = 3;

/** Words that make a short fragment a label or a reply rather than a claim. */
const NON_CLAIM_WORDS = new Set([
  "yes", "no", "note", "notes", "summary", "overview", "answer", "details",
  "in", "short", "brief", "key", "points", "facts", "however", "also",
  "example", "examples", "steps", "see", "below", "above", "sources", "source",
]);

export function validateCitations(
  rawText: string,
  passages: RetrievedPassage[],
  opts: ValidateOptions = {}
): CitationValidation {
  const report: ValidationReport = { totalClaims: 0, supportedClaims: 0, strippedClaims: 0, invalidMarkers: [] };

  if (isRefusal(rawText)) return rejected(report);

  const strip = (): Verdict => {
    report.totalClaims++;
    report.strippedClaims++;
    return "stripped";
  };

  const judge = (segment: string, kind: SegmentKind): Verdict => {
    const markers = extractMarkers(segment);
    if (markers.length === 0) {
      return kind !== "fence" && isStructural(segment, kind) ? "structural" : strip();
    }

    const invalid = markers.filter((n) => n < 1 || n > passages.length);
    if (invalid.length > 0) {
      report.invalidMarkers.push(...invalid);
      return strip();
    }
    // Markers with too little text around them support nothing.
    if (kind !== "fence" && claimWords(segment).length < MIN_CLAIM_WORDS) return "dangling";

    report.totalClaims++;
    report.supportedClaims++;
    return "supported";
  };

  const kept: string[] = [];
  const cited: number[] = [];
  const keep = (segment: string, verdict: Verdict): boolean => {
    if (verdict === "stripped" || verdict === "dangling") return false;
    if (verdict === "supported") cited.push(...extractMarkers(segment));
    return true;
  };

  for (const block of parseBlocks(rawText)) {
    switch (block.kind) {
      case "blank":
        kept.push("");
        break;
      case "fence":
        if (keep(block.text, judge(block.text, "fence"))) kept.push(block.text);
        break;
      case "heading":
        if (keep(block.text, judge(block.text, "heading"))) kept.push(block.text);
        break;
      case "line": {
        const sentences = block.sentences.filter((s) => keep(s, judge(s, "sentence")));
        if (sentences.length > 0) kept.push(`${block.prefix}${sentences.join(" ")}`);
        break;
      }
    }
  }

  if (report.supportedClaims === 0) return rejected(report);

  const citations = firstAppearance(cited).map((index) => ({ index, passage: passageAt(passages, index) }));
  const usedDocuments = [...new Set(citations.map((c) => c.passage.documentName))];
  const coverage = report.supportedClaims / report.totalClaims;
  const confidence = round4(clamp01(aggregate(citations, opts.aggregate ?? "min") * coverage));

  return {
    text: kept.join("\n").replace(/\n{3,}/g, "\n\n").trim(),
    usedDocuments,
    confidence,
    ok: true,
    citations,
    report,
  };
}

export function isRefusal(rawText: string): boolean {
  const text = stripMarkers(rawText);
  return text === "" || text === REFUSAL_TEXT;
}

function claimWords(segment: string): string[] {
  return stripMarkers(segment)
    .toLowerCase()
    .split(" ")
    .map((w) => w.replace(/[^\p{L}\p{N}'-]/gu, ""))
    .filter(Boolean);
}

/**
 * Uncited segments that state nothing: short headings, lead-in lines ending
 * with a colon, and fragments made only of label or reply words. Anything
 * with a digit is a claim.
 */
function isStructural(segment: string, kind: "sentence" | "heading"): boolean {
  if (/\d/.test(segment)) return false;
  const words = claimWords(segment);
  if (kind === "heading") return words.length < MIN_CLAIM_WORDS;
  if (segment.endsWith(":")) return true;
  return words.length > 0 && words.every((w) => NON_CLAIM_WORDS.has(w));
}

function rejected(report: ValidationReport): CitationValidation {
  return { text: "", usedDocuments: [], confidence: 0, ok: false, citations: [], report };
}

function firstAppearance(values: number[]): number[] {
  return [...new Set(values)];
}

function passageAt(passages: RetrievedPassage[], index: number): RetrievedPassage {
  const p = passages[index - 1];
  if (!p) throw new RangeError(`No passage for marker S${index}`);
  return p;
}

function aggregate(citations: Citation[], mode: ConfidenceAggregate): number {
  const scores = citations.map((c) => c.passage.similarity);
  if (scores.length === 0) return 0;
  if (mode === "mean") return scores.reduce((a, b) => a + b, 0) / scores.length;
  return Math.min(...scores);
}

function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.min(1, Math.max(0, x));
}

function round4(x: number): number {
  return Math.round(x * 10_000) / 10_000;
}
