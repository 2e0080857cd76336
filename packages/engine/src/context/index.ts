export type { AssemblyResult } from "./assembler.js"
export {
  ContextAssembler,
  CONVERSATION_HEADING,
  formatConversationLine,
  formatMemoryLine,
  MEMORY_HEADING,
} from "./assembler.js"
export { CharTokenCounter, estimateTokens } from "./token-counter.js"
