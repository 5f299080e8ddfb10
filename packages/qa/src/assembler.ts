import { REFUSAL_TEXT, type Answer, type SourceItem } from "@citeqa/core";
import type { CitationValidation } from "@citeqa/citations";

export const QUOTE_MAX_CHARS = 240;

export function refusalAnswer(): Answer {
  return { answer: REFUSAL_TEXT, confidence: 0, usedDocuments: [], sources: [], refusal: true };
}

export function compactQuote(text: string, maxChars = QUOTE_MAX_CHARS): string {
  const compact = text.replace(/\s+/g, " ").trim();
  if (compact.length <= maxChars) return compact;
  return `${compact.slice(0, maxChars - 1).trimEnd()}…`;
}

/**
 * Answer for a validated text. Sources follow the order markers first appear
 * in and stop at maxSources; usedDocuments still names every cited document.
 */
export function assembleAnswer(validation: CitationValidation, maxSources: number): Answer {
  const sources: SourceItem[] = validation.citations.slice(0, Math.max(0, maxSources)).map(({ index, passage }) => ({
    marker: `S${index}`,
    documentName: passage.documentName,
    version: passage.chunk.metadata.version,
    ordinal: passage.chunk.metadata.ordinal,
    similarity: passage.similarity,
    quote: compactQuote(passage.chunk.text),
  }));

  return {
    answer: validation.text,
    confidence: validation.confidence,
    usedDocuments: [...validation.usedDocuments],
    sources,
    refusal: false,
  };
}
