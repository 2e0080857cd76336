/**
 * Per-turn state machine.
 *
 * States:
 * - IDLE: no turn in flight
 * - RECORD_INCOMING: storing the incoming message as an observation
 * - MAYBE_REFLECT: reflecting if enough importance has accumulated
 * - RETRIEVE: ranking and selecting memories for the message
 * - ASSEMBLE: building the prompt within the context budget
 * - INVOKE: waiting on the language model
 * - RECORD_RESPONSE: storing the reply as an observation
 * - FAILED: the turn aborted; the next transition returns to IDLE
 */

import { MemoryEngineError } from "../errors/index.js"

export type TurnState =
  | "IDLE"
  | "RECORD_INCOMING"
  | "MAYBE_REFLECT"
  | "RETRIEVE"
  | "ASSEMBLE"
  | "INVOKE"
  | "RECORD_RESPONSE"
  | "FAILED"

export const VALID_TRANSITIONS: Record<TurnState, TurnState[]> = {
  IDLE: ["RECORD_INCOMING"],
  RECORD_INCOMING: ["MAYBE_REFLECT", "FAILED"],
  MAYBE_REFLECT: ["RETRIEVE", "FAILED"],
  RETRIEVE: ["ASSEMBLE", "FAILED"],
  ASSEMBLE: ["INVOKE", "FAILED"],
  INVOKE: ["RECORD_RESPONSE", "FAILED"],
  RECORD_RESPONSE: ["IDLE", "FAILED"],
  FAILED: ["IDLE"],
}

export class InvalidTransitionError extends MemoryEngineError {
  readonly code = "INVALID_TRANSITION"
  readonly from: TurnState
  readonly to: TurnState

  constructor(from: TurnState, to: TurnState) {
    super(`Invalid turn transition: ${from} -> ${to}`)
    this.name = "InvalidTransitionError"
    this.from = from
    this.to = to
  }
}

export function isValidTransition(from: TurnState, to: TurnState): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export interface TurnTransitionEvent {
  from: TurnState
  to: TurnState
  identity: string
  timestamp: number
}

export type TurnListener = (event: TurnTransitionEvent) => void

export class TurnStateMachine {
  private _state: TurnState = "IDLE"
  private readonly listeners: TurnListener[] = []

  constructor(
    private readonly identity: string,
    private readonly clock: () => number = Date.now,
  ) {}

  get state(): TurnState {
    return this._state
  }

  transition(to: TurnState): void {
    if (!isValidTransition(this._state, to)) {
      throw new InvalidTransitionError(this._state, to)
    }
    const event: TurnTransitionEvent = {
      from: this._state,
      to,
      identity: this.identity,
      timestamp: this.clock(),
    }
    this._state = to
    for (const listener of this.listeners) {
      listener(event)
    }
  }

  onTransition(listener: TurnListener): void {
    this.listeners.push(listener)
  }
}
