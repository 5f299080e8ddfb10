import "dotenv/config";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { createContainer } from "@citeqa/qa";
import { getArg, reportFailure, usage } from "./cli.js";

const file = getArg("file");
const version = getArg("version");
const documentId = getArg("id") ?? (file ? basename(file) : null);
const filename = getArg("name") ?? undefined;

if (!file || !version || !documentId) {
  usage("Usage: npm run ingest -- --file <path.txt> --version <label> [--id <documentId>] [--name <display name>]");
}

const container = createContainer();
try {
  console.log("[ingest] start", { file, documentId, version, dbPath: container.config.store.dbPath });

  const text = await readFile(file, "utf8");
  const chunks = await container.qa.ingest({ documentId, version, text, filename: filename ?? basename(file) });

  console.log("[ingest] stored", { documentId, version, chunks });
} catch (err) {
  reportFailure("ingest", err);
} finally {
  container.close();
}
