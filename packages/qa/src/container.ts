import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { loadConfig, setLogLevel, type AppConfig } from "@citeqa/core";
import { sharedOllamaEmbedder, type Embedder } from "@citeqa/embeddings";
import { AnswerGenerator, OllamaGenerator, type TextGenerator } from "@citeqa/generation";
import { SqliteStore, type VectorIndex } from "@citeqa/vectorstore";
import { Retriever } from "./retriever.js";
import { QaService } from "./service.js";

export type Container = {
  config: AppConfig;
  embedder: Embedder;
  index: VectorIndex;
  model: TextGenerator;
  retriever: Retriever;
  qa: QaService;
  close(): void;
};

export type ContainerOverrides = {
  embedder?: Embedder;
  index?: VectorIndex;
  model?: TextGenerator;
};

function openStore(dbPath: string): SqliteStore {
  if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
  const store = new SqliteStore(dbPath);
  store.init();
  return store;
}

/** Wires the process-wide model clients and the index once. */
export function createContainer(config: AppConfig = loadConfig(), overrides: ContainerOverrides = {}): Container {
  setLogLevel(config.logLevel);

  const embedder =
    overrides.embedder ??
    sharedOllamaEmbedder({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.embedModel,
      cacheSize: config.ollama.embedCacheSize,
    });
  const index = overrides.index ?? openStore(config.store.dbPath);
  const model =
    overrides.model ??
    new OllamaGenerator({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.generateModel,
      temperature: config.ollama.temperature,
      timeoutMs: config.ollama.timeoutMs,
    });

  const retriever = new Retriever(embedder, index, config.retrieval);
  const qa = new QaService({
    embedder,
    index,
    retriever,
    generator: new AnswerGenerator(model),
    chunking: config.chunking,
    citations: config.citations,
  });

  return {
    config,
    embedder,
    index,
    model,
    retriever,
    qa,
    close: () => index.close(),
  };
}
