import type { ReflectionEngine } from "../memory/reflection.js"
import type { MemoryStream } from "../memory/stream.js"
import type { ConversationBuffer } from "./buffer.js"

export interface AgentProfile {
  /** Owner of the memory stream; turns for one identity never overlap. */
  identity: string
  /** Speaker label for the agent's own replies. */
  name: string
  /** System / persona text placed first in every prompt. */
  persona: string
}

/**
 * Everything that belongs to one agent identity. Instances are passed to
 * ConversationManager calls explicitly; nothing is process-global.
 */
export interface AgentMemory extends Readonly<AgentProfile> {
  readonly stream: MemoryStream
  readonly buffer: ConversationBuffer
  readonly reflection: ReflectionEngine
}
