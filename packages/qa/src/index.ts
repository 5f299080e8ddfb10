export { QUOTE_MAX_CHARS, assembleAnswer, compactQuote, refusalAnswer } from "./assembler.js";
export { createContainer, type Container, type ContainerOverrides } from "./container.js";
export { KeyedLock } from "./keyedLock.js";
export { Retriever, type RetrieveParams, type RetrieverOptions } from "./retriever.js";
export { QaService, type IngestInput, type QaServiceDeps } from "./service.js";
