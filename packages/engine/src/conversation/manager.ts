import type {
  Embedder,
  LanguageModel,
  MemoryStreamRepository,
  TokenCounter,
  VectorIndex,
} from "../adapters/types.js"
import { ContextAssembler } from "../context/assembler.js"
import {
  ExternalCallFailure,
  guardExternalCall,
  MemoryEngineError,
} from "../errors/index.js"
import { MemoryRecorder, type MemoryRequest } from "../memory/recorder.js"
import { ReflectionEngine, type ReflectionOutcome } from "../memory/reflection.js"
import { type Retrieval, retrievedRecords, Retriever } from "../memory/retriever.js"
import type { Scorer } from "../memory/scoring.js"
import { MemoryStream, type StreamCheckpoint } from "../memory/stream.js"
import type { MemoryKind, MemoryRecord } from "../memory/types.js"
import { errorFields, type Logger, TracingLogger } from "../tracing/logger.js"
import { addSpanEvent, MemoryAttributes, withSpan } from "../tracing/spans.js"
import type { AgentMemory, AgentProfile } from "./agent.js"
import { ConversationBuffer, type ConversationEntry } from "./buffer.js"
import { KeyedSerialQueue } from "./serial-queue.js"
import { type TurnState, TurnStateMachine } from "./state-machine.js"

const DEFAULT_MEMORY_BUDGET = 1_000
const DEFAULT_CONTEXT_BUDGET = 4_096
const DEFAULT_MAX_RESPONSE_TOKENS = 512
const DEFAULT_TAIL_SIZE = 20

export class TurnFailedError extends MemoryEngineError {
  readonly code = "TURN_FAILED"
  /** The turn state that was active when the failure happened. */
  readonly state: TurnState
  readonly retryable: boolean
  override readonly cause: unknown

  constructor(state: TurnState, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Turn failed during ${state}: ${detail}`)
    this.name = "TurnFailedError"
    this.state = state
    this.cause = cause
    this.retryable = cause instanceof ExternalCallFailure && cause.retryable
  }
}

export interface ReflectionSettings {
  threshold?: number
  topK?: number
  budget?: number
  maxInsights?: number
  planning?: boolean
}

export type ReflectionFailurePolicy = "continue" | "abort"

export interface ConversationManagerOptions {
  embedder: Embedder
  model: LanguageModel
  counter: TokenCounter
  scorer?: Scorer
  vectorIndex?: VectorIndex
  candidatePool?: number
  repository?: MemoryStreamRepository
  /** Units available to retrieved memories. */
  memoryBudget?: number
  /** The model's context window, in counter units. */
  contextBudget?: number
  /** Reserved out of the context window for the reply. */
  maxResponseTokens?: number
  /** Newest buffer entries offered to the assembler. */
  tailSize?: number
  /** Entries kept per conversation buffer. */
  bufferSize?: number
  reflection?: ReflectionSettings
  /**
   * "continue" (default) logs a failed reflection and retries it on the
   * next turn; "abort" fails the turn.
   */
  reflectionFailurePolicy?: ReflectionFailurePolicy
  timeoutMs?: number
  clock?: () => number
  logger?: Logger
}

interface AgentCheckpoint {
  stream: StreamCheckpoint
  buffer: ConversationEntry[]
  pendingImportance: number
}

export type RememberRequest = Omit<MemoryRequest, "kind"> & { kind?: MemoryKind }

export interface IncomingMessage {
  speaker: string
  text: string
}

export interface TurnResult {
  response: string
  prompt: string
  promptUnits: number
  incoming: MemoryRecord
  reply: MemoryRecord
  retrieval: Retrieval
  reflection: ReflectionOutcome
  /** Set when reflection failed and the turn continued anyway. */
  reflectionError?: ExternalCallFailure
}

/**
 * Orchestrates turns: record the message, maybe reflect, retrieve,
 * assemble, invoke the model, record the reply. Turns for one identity are
 * serialised; different identities proceed in parallel.
 *
 * A turn commits as a whole. When any step fails, the agent's stream,
 * buffer and reflection counter return to where they were before the turn
 * and nothing from it is saved, so the caller can retry the same message.
 */
export class ConversationManager {
  readonly retriever: Retriever
  readonly recorder: MemoryRecorder

  private readonly model: LanguageModel
  private readonly assembler: ContextAssembler
  private readonly vectorIndex: VectorIndex | undefined
  private readonly repository: MemoryStreamRepository | undefined
  private readonly memoryBudget: number
  private readonly promptBudget: number
  private readonly maxResponseTokens: number
  private readonly tailSize: number
  private readonly bufferSize: number | undefined
  private readonly reflectionSettings: ReflectionSettings
  private readonly reflectionFailurePolicy: ReflectionFailurePolicy
  private readonly timeoutMs: number | undefined
  private readonly clock: () => number
  private readonly logger: Logger
  private readonly queue = new KeyedSerialQueue()

  constructor(options: ConversationManagerOptions) {
    this.model = options.model
    this.vectorIndex = options.vectorIndex
    this.repository = options.repository
    this.memoryBudget = options.memoryBudget ?? DEFAULT_MEMORY_BUDGET
    this.maxResponseTokens = options.maxResponseTokens ?? DEFAULT_MAX_RESPONSE_TOKENS
    this.promptBudget = (options.contextBudget ?? DEFAULT_CONTEXT_BUDGET) - this.maxResponseTokens
    this.tailSize = options.tailSize ?? DEFAULT_TAIL_SIZE
    this.bufferSize = options.bufferSize
    this.reflectionSettings = options.reflection ?? {}
    this.reflectionFailurePolicy = options.reflectionFailurePolicy ?? "continue"
    this.timeoutMs = options.timeoutMs
    this.clock = options.clock ?? Date.now
    this.logger = options.logger ?? new TracingLogger()

    if (this.promptBudget <= 0) {
      throw new RangeError("contextBudget must exceed maxResponseTokens")
    }

    this.retriever = new Retriever({
      embedder: options.embedder,
      counter: options.counter,
      scorer: options.scorer,
      clock: this.clock,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
      vectorIndex: options.vectorIndex,
      candidatePool: options.candidatePool,
    })
    this.recorder = new MemoryRecorder({
      embedder: options.embedder,
      model: options.model,
      timeoutMs: this.timeoutMs,
      clock: this.clock,
    })
    this.assembler = new ContextAssembler(options.counter)
  }

  /** Build an agent around an existing (or empty) set of records. */
  createAgent(profile: AgentProfile, records: readonly MemoryRecord[] = []): AgentMemory {
    const stream = MemoryStream.restore(profile.identity, records)
    const reflection = new ReflectionEngine({
      ...this.reflectionSettings,
      retriever: this.retriever,
      recorder: this.recorder,
      model: this.model,
      timeoutMs: this.timeoutMs,
      logger: this.logger.child({ identity: profile.identity }),
    })
    reflection.hydrate(stream)

    return {
      identity: profile.identity,
      name: profile.name,
      persona: profile.persona,
      stream,
      buffer: new ConversationBuffer(this.bufferSize),
      reflection,
    }
  }

  /** Build an agent from the repository's stored records, if one is configured. */
  async openAgent(profile: AgentProfile): Promise<AgentMemory> {
    const repository = this.repository
    const records = repository
      ? await guardExternalCall(
          "repository.load",
          () => repository.load(profile.identity),
          this.timeoutMs,
        )
      : []
    const agent = this.createAgent(profile, records)
    this.logger.info("Agent memory opened", {
      identity: profile.identity,
      records: agent.stream.size,
      pendingImportance: agent.reflection.pendingImportance,
    })
    return agent
  }

  /** Store a memory outside of a turn (seeded facts, imported notes). */
  async remember(agent: AgentMemory, request: RememberRequest): Promise<MemoryRecord> {
    return this.queue.run(agent.identity, async () => {
      const checkpoint = checkpointAgent(agent)
      try {
        const record = await this.recorder.record(agent.stream, {
          ...request,
          kind: request.kind ?? "observation",
        })
        agent.reflection.observe(record)
        await this.persist(agent)
        return record
      } catch (err) {
        rollbackAgent(agent, checkpoint)
        throw err
      }
    })
  }

  async turn(agent: AgentMemory, message: IncomingMessage): Promise<TurnResult> {
    return this.queue.run(agent.identity, () => this.runTurn(agent, message))
  }

  private async runTurn(agent: AgentMemory, message: IncomingMessage): Promise<TurnResult> {
    const logger = this.logger.child({ identity: agent.identity })
    const machine = new TurnStateMachine(agent.identity, this.clock)
    const checkpoint = checkpointAgent(agent)
    machine.onTransition((event) => {
      logger.debug("Turn transition", { from: event.from, to: event.to })
    })

    return withSpan(
      "mnemos.conversation.turn",
      {
        [MemoryAttributes.AGENT_IDENTITY]: agent.identity,
        [MemoryAttributes.STORE_SIZE]: agent.stream.size,
      },
      async (span) => {
        try {
          machine.transition("RECORD_INCOMING")
          const incoming = await this.recorder.record(agent.stream, {
            text: `${message.speaker}: ${message.text}`,
            kind: "observation",
          })
          agent.buffer.append({
            speaker: message.speaker,
            text: message.text,
            timestamp: incoming.createdAt,
          })
          agent.reflection.observe(incoming)

          machine.transition("MAYBE_REFLECT")
          let reflection: ReflectionOutcome = { reflections: [], plans: [] }
          let reflectionError: ExternalCallFailure | undefined
          try {
            reflection = await agent.reflection.maybeReflect(agent.stream)
          } catch (err) {
            if (!(err instanceof ExternalCallFailure) || this.reflectionFailurePolicy === "abort") {
              throw err
            }
            reflectionError = err
            addSpanEvent("mnemos.reflection.deferred", {
              [MemoryAttributes.REFLECTION_PENDING]: agent.reflection.pendingImportance,
            })
            logger.warn("Reflection failed, will retry next turn", {
              pendingImportance: agent.reflection.pendingImportance,
              ...errorFields(err),
            })
          }

          machine.transition("RETRIEVE")
          const retrieval = await this.retriever.retrieve(
            agent.stream,
            message.text,
            this.memoryBudget,
          )

          machine.transition("ASSEMBLE")
          const assembly = this.assembler.assemble(
            retrievedRecords(retrieval),
            agent.buffer.tail(this.tailSize),
            agent.persona,
            this.promptBudget,
          )
          if (!assembly.ok) throw assembly.error
          span.setAttribute(MemoryAttributes.CONTEXT_UNITS, assembly.usedUnits)

          machine.transition("INVOKE")
          const response = await guardExternalCall(
            "complete",
            () => this.model.complete(assembly.prompt, this.maxResponseTokens),
            this.timeoutMs,
          )
          if (response.trim().length === 0) {
            throw new ExternalCallFailure("complete", "model returned an empty completion")
          }

          machine.transition("RECORD_RESPONSE")
          const reply = await this.recorder.record(agent.stream, {
            text: `${agent.name}: ${response}`,
            kind: "observation",
          })
          agent.buffer.append({ speaker: agent.name, text: response, timestamp: reply.createdAt })
          agent.reflection.observe(reply)

          await this.persist(agent)
          machine.transition("IDLE")

          return {
            response,
            prompt: assembly.prompt,
            promptUnits: assembly.usedUnits,
            incoming,
            reply,
            retrieval,
            reflection,
            reflectionError,
          }
        } catch (err) {
          const failedIn = machine.state
          span.setAttribute(MemoryAttributes.TURN_STATE, failedIn)
          machine.transition("FAILED")
          rollbackAgent(agent, checkpoint)
          logger.error("Turn failed, memory rolled back", { state: failedIn, ...errorFields(err) })
          machine.transition("IDLE")
          throw new TurnFailedError(failedIn, err)
        }
      },
    )
  }

  /**
   * Flush the stream's change journal. The index goes first: its upserts
   * overwrite by id, so points left behind by a rolled-back turn are replaced
   * when those ids are assigned again. The repository save is the commit.
   */
  private async persist(agent: AgentMemory): Promise<void> {
    const changes = agent.stream.takeChanges()
    if (changes.inserted.length === 0 && changes.touched.length === 0) return

    const index = this.vectorIndex
    if (index && changes.inserted.length > 0) {
      await guardExternalCall(
        "vectorIndex.upsert",
        () => index.upsert(agent.identity, changes.inserted),
        this.timeoutMs,
      )
    }

    const repository = this.repository
    if (repository) {
      await guardExternalCall(
        "repository.save",
        () => repository.save(agent.identity, changes),
        this.timeoutMs,
      )
    }
  }
}

function checkpointAgent(agent: AgentMemory): AgentCheckpoint {
  return {
    stream: agent.stream.checkpoint(),
    buffer: agent.buffer.tail(),
    pendingImportance: agent.reflection.pendingImportance,
  }
}

function rollbackAgent(agent: AgentMemory, checkpoint: AgentCheckpoint): void {
  agent.stream.rollback(checkpoint.stream)
  agent.buffer.restore(checkpoint.buffer)
  agent.reflection.restorePending(checkpoint.pendingImportance)
}
