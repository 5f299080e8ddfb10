export { MARKER_PATTERN, extractMarkers, leadingMarkers, stripMarkers } from "./markers.js";
export { parseBlocks, splitSentences, type Block } from "./segments.js";
export {
  isRefusal,
  validateCitations,
  type Citation,
  type CitationValidation,
  type ValidateOptions,
  type ValidationReport,
} from "./validator.js";
