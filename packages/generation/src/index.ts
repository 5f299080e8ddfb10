export {
  SYSTEM_PROMPT,
  buildPrompt,
  citationMarker,
  detectComplexity,
  detectRequestKind,
  formatContext,
  type Complexity,
  type Prompt,
  type RequestKind,
} from "./prompt.js";
export { generateWithOllama } from "./ollama.js";
export {
  AnswerGenerator,
  OllamaGenerator,
  type OllamaGeneratorOptions,
  type TextGenerator,
} from "./generator.js";
