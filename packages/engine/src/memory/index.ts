export type { MemoryRecorderOptions, MemoryRequest, PreparedMemory } from "./recorder.js"
export { MemoryRecorder } from "./recorder.js"
export type { ReflectionOptions, ReflectionOutcome } from "./reflection.js"
export {
  cleanInsights,
  DEFAULT_REFLECTION_THRESHOLD,
  REFLECTIVE_QUERY,
  ReflectionEngine,
} from "./reflection.js"
export type { Retrieval, RetrieveOptions, RetrieverOptions } from "./retriever.js"
export { retrievedRecords, Retriever } from "./retriever.js"
export type { SerializedMemoryRecord, StreamSnapshot } from "./schemas.js"
export {
  MemoryKindSchema,
  SerializedMemoryRecordSchema,
  SNAPSHOT_VERSION,
  StreamSnapshotSchema,
} from "./schemas.js"
export type { PreparedQuery, ScorerOptions } from "./scoring.js"
export {
  calculateRecency,
  compareScored,
  DEFAULT_DECAY_FACTOR,
  DEFAULT_WEIGHTS,
  normalizeWeights,
  prepareQuery,
  rankMemories,
  rescaleCosine,
  scaleImportance,
  Scorer,
  validateWeights,
} from "./scoring.js"
export { cosineSimilarity, cosineWithNorms, vectorNorm } from "./similarity.js"
export {
  parseSnapshot,
  restoreStream,
  serializeRecord,
  serializeStream,
  stringifySnapshot,
} from "./snapshot.js"
export { MemoryStream, type StreamCheckpoint } from "./stream.js"
export type {
  AccessUpdate,
  ImportanceRange,
  MemoryChanges,
  MemoryDraft,
  MemoryKind,
  MemoryRecord,
  ScoreBreakdown,
  ScoredMemory,
  ScoringWeights,
} from "./types.js"
export { MAX_IMPORTANCE, MIN_IMPORTANCE } from "./types.js"
