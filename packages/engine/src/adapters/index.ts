export type {
  Embedder,
  LanguageModel,
  MemoryStreamRepository,
  SynthesisMode,
  TokenCounter,
  VectorIndex,
  VectorMatch,
} from "./types.js"
