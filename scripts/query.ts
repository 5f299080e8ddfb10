import "dotenv/config";
import { createContainer } from "@citeqa/qa";
import { getArg, reportFailure, usage } from "./cli.js";

function getArgNumber(name: string): number | undefined {
  const v = getArg(name);
  if (!v) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

const q = getArg("q");
if (!q) {
  usage("Usage: npm run query -- --q <question> [--version <label>] [--topK 8] [--threshold 0.55]");
}

const container = createContainer();
try {
  const results = await container.retriever.retrieve({
    question: q,
    version: getArg("version") ?? undefined,
    topK: getArgNumber("topK"),
    similarityThreshold: getArgNumber("threshold"),
  });

  console.log("[query] results:", results.length);

  for (const r of results) {
    const md = r.chunk.metadata;

    console.log("—".repeat(80));
    console.log(`similarity: ${r.similarity.toFixed(4)}`);
    console.log(`source: ${r.documentName}  >  version ${md.version}, part ${md.ordinal + 1}`);
    console.log("");
    console.log(r.chunk.text.slice(0, 600));
    if (r.chunk.text.length > 600) console.log("…");
  }

  console.log("—".repeat(80));
} catch (err) {
  reportFailure("query", err);
} finally {
  container.close();
}
