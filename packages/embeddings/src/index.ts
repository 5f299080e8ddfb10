export {
  OllamaEmbedder,
  sharedOllamaEmbedder,
  type Embedder,
  type OllamaEmbedderOptions,
} from "./embedder.js";
export { ollamaEmbedOne } from "./ollama.js";
