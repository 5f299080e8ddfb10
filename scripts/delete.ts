import "dotenv/config";
import { createContainer } from "@citeqa/qa";
import { getArg, hasFlag, reportFailure, usage } from "./cli.js";

const documentId = getArg("id");
const restore = hasFlag("restore");

if (!documentId) usage("Usage: npm run delete -- --id <documentId> [--restore]");

const container = createContainer();
try {
  const changed = restore ? container.qa.restore(documentId) : container.qa.softDelete(documentId);
  if (!changed) {
    console.error(`[delete] unknown document: ${documentId}`);
    process.exitCode = 1;
  } else {
    console.log(`[delete] ${restore ? "restored" : "soft-deleted"}`, { documentId });
  }
} catch (err) {
  reportFailure("delete", err);
} finally {
  container.close();
}
