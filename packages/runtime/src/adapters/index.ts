export type {
  AnthropicMessagesClient,
  ChatFn,
  ChatRequest,
  HttpLanguageModelOptions,
  OpenAIChatClient,
} from "./http-language-model.js"
export { anthropicChat, HttpLanguageModel, openAIChat } from "./http-language-model.js"
export type { EmbeddingsClient, OpenAIEmbedderOptions } from "./openai-embedder.js"
export { normalizeEmbeddingInput, OpenAIEmbedder } from "./openai-embedder.js"
export type { QdrantPointsClient, QdrantVectorIndexOptions } from "./qdrant-index.js"
export { collectionNameFor, QdrantVectorIndex } from "./qdrant-index.js"
export { TiktokenCounter } from "./tiktoken-counter.js"
