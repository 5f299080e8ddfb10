export interface ChunkOptions {
  /** Target upper bound of a chunk, in characters. */
  maxChars: number;
  /** Fraction of maxChars repeated at the start of the next chunk, in [0, 0.5]. */
  overlap: number;
}

export interface TextChunk {
  text: string;
  ordinal: number;
}

type Unit = {
  text: string;
  sep: string; // placed before the unit unless it opens a chunk
};

const TABLE_ROW = /^\|.*\|$/;
const MAX_TAB_CELL_CHARS = 60;

/** `|`-framed lines, or tab-separated lines whose cells all look like cells. */
function isTableRow(line: string): boolean {
  if (TABLE_ROW.test(line)) return true;
  const cells = line.split("\t").map((c) => c.trim()).filter(Boolean);
  return cells.length >= 2 && cells.every((c) => c.length <= MAX_TAB_CELL_CHARS);
}

/**
 * Words for prose, whole rows for tables. A table row is never split, so a
 * row longer than maxChars later becomes a chunk of its own.
 */
function toUnits(text: string): Unit[] {
  const units: Unit[] = [];
  let blockStart = true;
  let prevWasRow = false;

  for (const raw of text.replace(/\r\n?/g, "\n").split("\n")) {
    const line = raw.trim();
    if (!line) {
      blockStart = true;
      continue;
    }

    if (isTableRow(line)) {
      units.push({ text: line.replace(/ {2,}/g, " "), sep: blockStart ? "\n\n" : "\n" });
      prevWasRow = true;
    } else {
      const words = line.split(/\s+/);
      words.forEach((word, i) => {
        let sep = " ";
        if (i === 0 && blockStart) sep = "\n\n";
        else if (i === 0 && prevWasRow) sep = "\n";
        units.push({ text: word, sep });
      });
      prevWasRow = false;
    }
    blockStart = false;
  }

  return units;
}

function join(units: Unit[], start: number, end: number): string {
  let out = "";
  for (let i = start; i < end; i++) {
    const u = units[i];
    if (!u) break;
    out += i === start ? u.text : u.sep + u.text;
  }
  return out;
}

function unitAt(units: Unit[], i: number): Unit {
  const u = units[i];
  if (!u) throw new RangeError(`unit index out of range: ${i}`);
  return u;
}

export function chunkText(text: string, opts: ChunkOptions): TextChunk[] {
  const { maxChars, overlap } = opts;
  if (!Number.isInteger(maxChars) || maxChars < 20) {
    throw new RangeError(`maxChars must be an integer >= 20, got ${maxChars}`);
  }
  if (!(overlap >= 0 && overlap <= 0.5)) {
    throw new RangeError(`overlap must be within [0, 0.5], got ${overlap}`);
  }

  const units = toUnits(text);
  if (units.length === 0) return [];

  const overlapChars = Math.floor(maxChars * overlap);
  const parts: string[] = [];
  let start = 0;

  while (start < units.length) {
    let end = start + 1;
    let length = unitAt(units, start).text.length;
    while (end < units.length) {
      const next = unitAt(units, end);
      const added = next.sep.length + next.text.length;
      if (length + added > maxChars) break;
      length += added;
      end++;
    }

    parts.push(join(units, start, end));
    if (end >= units.length) break;

    // walk back from `end` while the tail still fits in the overlap budget
    let next = end;
    let overlapLen = 0;
    while (next - 1 > start) {
      const cost = unitAt(units, next - 1).text.length + (next < end ? unitAt(units, next).sep.length : 0);
      if (overlapLen + cost > overlapChars) break;
      overlapLen += cost;
      next--;
    }

    const following = unitAt(units, end);
    if (next < end && overlapLen + following.sep.length + following.text.length > maxChars) {
      next = end;
    }
    start = next;
  }

  return parts.map((part, ordinal) => ({ text: part, ordinal }));
}
