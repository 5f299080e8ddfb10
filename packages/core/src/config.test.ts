import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("falls back to defaults for unset and empty variables", () => {
    const config = loadConfig({ SIMILARITY_THRESHOLD: "", OLLAMA_BASE_URL: "   " });

    expect(config.ollama.baseUrl).toBe("http://localhost:11434");
    expect(config.ollama.embedModel).toBe("nomic-embed-text:latest");
    expect(config.retrieval).toEqual({ topK: 8, similarityThreshold: 0.55 });
    expect(config.chunking).toEqual({ maxChars: 1200, overlap: 0.15 });
    expect(config.citations).toEqual({ aggregate: "min", maxSources: 3 });
    expect(config.store.dbPath).toBe(".data/vectorstore.sqlite");
    expect(config.logLevel).toBe("info");
  });

  it("reads overrides and strips trailing slashes from the base url", () => {
    const config = loadConfig({
      OLLAMA_BASE_URL: "http://models.internal:11434/",
      SIMILARITY_THRESHOLD: "0.75",
      RETRIEVAL_TOP_K: "4",
      CONFIDENCE_AGGREGATE: "MEAN",
      LOG_LEVEL: "debug",
    });

    expect(config.ollama.baseUrl).toBe("http://models.internal:11434");
    expect(config.retrieval).toEqual({ topK: 4, similarityThreshold: 0.75 });
    expect(config.citations.aggregate).toBe("mean");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects a threshold outside [0, 1]", () => {
    expect(() => loadConfig({ SIMILARITY_THRESHOLD: "1.5" })).toThrow(
      "SIMILARITY_THRESHOLD must be between 0 and 1, got 1.5"
    );
  });

  it("rejects non-numeric and non-integer values", () => {
    expect(() => loadConfig({ RETRIEVAL_TOP_K: "many" })).toThrow(ConfigError);
    expect(() => loadConfig({ RETRIEVAL_TOP_K: "2.5" })).toThrow(
      'RETRIEVAL_TOP_K must be an integer, got "2.5"'
    );
  });

  it("rejects unknown aggregates and log levels", () => {
    expect(() => loadConfig({ CONFIDENCE_AGGREGATE: "max" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });
});
