/** `[S1]` or a group such as `[S1, S3]`. Numbers are 1-based passage indices. */
export const MARKER_PATTERN = /\[(S\d+(?:\s*,\s*S\d+)*)\]/g;

const LEADING_MARKERS = /^(?:\[S\d+(?:\s*,\s*S\d+)*\]\s*)+/;

/** Passage numbers referenced in `text`, in order of appearance, repeats included. */
export function extractMarkers(text: string): number[] {
  const out: number[] = [];
  for (const m of text.matchAll(MARKER_PATTERN)) {
    for (const part of (m[1] ?? "").split(",")) {
      out.push(Number.parseInt(part.trim().slice(1), 10));
    }
  }
  return out;
}

export function stripMarkers(text: string): string {
  return text.replace(MARKER_PATTERN, " ").replace(/\s+/g, " ").trim();
}

/** Markers opening `text`, or "" when it does not start with one. */
export function leadingMarkers(text: string): string {
  return LEADING_MARKERS.exec(text)?.[0] ?? "";
}
