import "dotenv/config";
import { ANSWER_MODES, QUERY_TYPES, type AnswerMode, type QueryType } from "@citeqa/core";
import { createContainer } from "@citeqa/qa";
import { getArg, reportFailure, usage } from "./cli.js";

const USAGE = `Usage:
npm run ask -- --q "..." \\
  [--type sales|technical] \\
  [--mode brief|standard|detailed] \\
  [--version <label>] \\
  [--docs <id>,<id>]`;

function parseType(raw: string | null): QueryType {
  const found = QUERY_TYPES.find((t) => t === (raw ?? "technical"));
  return found ?? usage(USAGE);
}

function parseMode(raw: string | null): AnswerMode {
  const found = ANSWER_MODES.find((m) => m === (raw ?? "standard"));
  return found ?? usage(USAGE);
}

const q = getArg("q");
if (!q) usage(USAGE);

const type = parseType(getArg("type"));
const mode = parseMode(getArg("mode"));
const version = getArg("version") ?? undefined;
const documentIds = getArg("docs")
  ?.split(",")
  .map((id) => id.trim())
  .filter(Boolean);

const container = createContainer();
try {
  const answer = await container.qa.ask({
    question: q,
    type,
    mode,
    ...(version !== undefined && { version }),
    ...(documentIds !== undefined && { documentIds }),
  });

  console.log("\n=== ANSWER ===\n");
  console.log(answer.answer);

  if (!answer.refusal) {
    console.log(`\nconfidence: ${answer.confidence.toFixed(4)}`);
    console.log("\n=== SOURCES USED ===\n");
    for (const s of answer.sources) {
      console.log(`[${s.marker}] ${s.documentName} (version ${s.version}, part ${s.ordinal + 1}, similarity=${s.similarity.toFixed(4)})`);
      console.log(`    ${s.quote}`);
    }
  }
} catch (err) {
  reportFailure("ask", err);
} finally {
  container.close();
}
