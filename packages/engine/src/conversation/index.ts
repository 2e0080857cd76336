export type { AgentMemory, AgentProfile } from "./agent.js"
export type { ConversationEntry } from "./buffer.js"
export { ConversationBuffer } from "./buffer.js"
export type {
  ConversationManagerOptions,
  IncomingMessage,
  ReflectionFailurePolicy,
  ReflectionSettings,
  RememberRequest,
  TurnResult,
} from "./manager.js"
export { ConversationManager, TurnFailedError } from "./manager.js"
export { KeyedSerialQueue } from "./serial-queue.js"
export type { TurnListener, TurnState, TurnTransitionEvent } from "./state-machine.js"
export {
  InvalidTransitionError,
  isValidTransition,
  TurnStateMachine,
  VALID_TRANSITIONS,
} from "./state-machine.js"
