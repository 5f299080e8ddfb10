import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type ConfidenceAggregate = "min" | "mean";

export interface AppConfig {
  ollama: {
    baseUrl: string;
    embedModel: string;
    embedCacheSize: number;
    generateModel: string;
    temperature: number;
    timeoutMs: number;
  };
  chunking: {
    maxChars: number;
    overlap: number;
  };
  retrieval: {
    topK: number;
    similarityThreshold: number;
  };
  citations: {
    aggregate: ConfidenceAggregate;
    maxSources: number;
  };
  store: {
    dbPath: string;
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  range: { min: number; max: number; integer?: boolean }
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${name} must be a number, got "${raw}"`);
  if (range.integer && !Number.isInteger(n)) throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  if (n < range.min || n > range.max) {
    throw new ConfigError(`${name} must be between ${range.min} and ${range.max}, got ${n}`);
  }
  return n;
}

function readAggregate(env: Env): ConfidenceAggregate {
  const raw = readString(env, "CONFIDENCE_AGGREGATE", "min").toLowerCase();
  if (raw === "min" || raw === "mean") return raw;
  throw new ConfigError(`CONFIDENCE_AGGREGATE must be "min" or "mean", got "${raw}"`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = readString(env, "LOG_LEVEL", "info").toLowerCase();
  if (isLogLevel(raw)) return raw;
  throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent; got "${raw}"`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    ollama: {
      baseUrl: readString(env, "OLLAMA_BASE_URL", "http://localhost:11434").replace(/\/+$/, ""),
      embedModel: readString(env, "EMBED_MODEL", "nomic-embed-text:latest"),
      embedCacheSize: readNumber(env, "EMBED_CACHE_SIZE", 2048, { min: 0, max: 1_000_000, integer: true }),
      generateModel: readString(env, "GENERATE_MODEL", "llama3.1:8b"),
      temperature: readNumber(env, "GENERATE_TEMPERATURE", 0.2, { min: 0, max: 2 }),
      timeoutMs: readNumber(env, "GENERATE_TIMEOUT_MS", 60_000, { min: 1, max: 600_000, integer: true }),
    },
    chunking: {
      maxChars: readNumber(env, "CHUNK_MAX_CHARS", 1200, { min: 20, max: 100_000, integer: true }),
      overlap: readNumber(env, "CHUNK_OVERLAP", 0.15, { min: 0, max: 0.5 }),
    },
    retrieval: {
      topK: readNumber(env, "RETRIEVAL_TOP_K", 8, { min: 1, max: 1000, integer: true }),
      similarityThreshold: readNumber(env, "SIMILARITY_THRESHOLD", 0.55, { min: 0, max: 1 }),
    },
    citations: {
      aggregate: readAggregate(env),
      maxSources: readNumber(env, "MAX_SOURCES", 3, { min: 0, max: 100, integer: true }),
    },
    store: {
      dbPath: readString(env, "VECTORSTORE_PATH", ".data/vectorstore.sqlite"),
    },
    logLevel: readLogLevel(env),
  };
}
