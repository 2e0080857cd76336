/**
 * HTTP language model
 *
 * Calls LLM APIs directly over HTTP (Anthropic Claude or OpenAI-compatible)
 * for completions, importance ratings and reflection/plan synthesis.
 */

import Anthropic from "@anthropic-ai/sdk"
import type { LanguageModel, MemoryRecord, SynthesisMode } from "@mnemos/engine"
import OpenAI from "openai"

import type { LlmProvider } from "../config.js"
import { buildImportancePrompt, parseImportance } from "../prompts/importance.js"
import { buildSynthesisPrompt, parseStatements } from "../prompts/synthesis.js"

// ──────────────────────────────────────────────────
// Provider clients
// ──────────────────────────────────────────────────

/** The slice of the OpenAI SDK this adapter calls. */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string
        max_tokens: number
        temperature: number
        messages: { role: "system" | "user"; content: string }[]
      }): Promise<{ choices: { message: { content: string | null } }[] }>
    }
  }
}

/** The slice of the Anthropic SDK this adapter calls. */
export interface AnthropicMessagesClient {
  messages: {
    create(params: {
      model: string
      max_tokens: number
      temperature: number
      system?: string
      messages: { role: "user"; content: string }[]
    }): Promise<{ content: { type: string; text?: string }[] }>
  }
}

export interface ChatRequest {
  system?: string
  prompt: string
  maxTokens: number
}

/** One-shot, non-streaming chat call returning the reply text. */
export type ChatFn = (request: ChatRequest) => Promise<string>

export function openAIChat(client: OpenAIChatClient, model: string, temperature: number): ChatFn {
  return async ({ system, prompt, maxTokens }) => {
    const messages: { role: "system" | "user"; content: string }[] = []
    if (system) messages.push({ role: "system", content: system })
    messages.push({ role: "user", content: prompt })

    const completion = await client.chat.completions.create({
      model,
      max_tokens: maxTokens,
      temperature,
      messages,
    })
    return completion.choices[0]?.message.content ?? ""
  }
}

export function anthropicChat(
  client: AnthropicMessagesClient,
  model: string,
  temperature: number,
): ChatFn {
  return async ({ system, prompt, maxTokens }) => {
    const message = await client.messages.create({
      model,
      max_tokens: maxTokens,
      // Anthropic caps temperature at 1.0
      temperature: Math.min(temperature, 1),
      ...(system ? { system } : {}),
      messages: [{ role: "user", content: prompt }],
    })
    return message.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("")
  }
}

// ──────────────────────────────────────────────────
// Language model
// ──────────────────────────────────────────────────

export interface HttpLanguageModelOptions {
  provider?: LlmProvider
  apiKey?: string
  model?: string
  baseUrl?: string
  /** 0.0 to 2.0. */
  temperature?: number
  /** Statements requested per synthesis call. */
  maxStatements?: number
  /** Replaces the SDK-backed chat call. */
  chat?: ChatFn
}

const DEFAULT_TEMPERATURE = 0.7
const RATING_MAX_TOKENS = 8
const SYNTHESIS_MAX_TOKENS = 1_024

export class HttpLanguageModel implements LanguageModel {
  readonly provider: LlmProvider
  readonly model: string

  private readonly chat: ChatFn
  private readonly maxStatements: number

  constructor(options: HttpLanguageModelOptions = {}) {
    this.provider = options.provider ?? "openai"
    this.model = options.model ?? defaultModel(this.provider)
    this.maxStatements = options.maxStatements ?? 3

    const temperature = options.temperature ?? DEFAULT_TEMPERATURE
    if (!(temperature >= 0 && temperature <= 2)) {
      throw new RangeError(`temperature must be between 0 and 2, got ${temperature}`)
    }

    this.chat = options.chat ?? this.createChat(options, temperature)
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    return this.chat({ prompt, maxTokens })
  }

  async scoreImportance(text: string): Promise<number> {
    const reply = await this.chat({ prompt: buildImportancePrompt(text), maxTokens: RATING_MAX_TOKENS })
    const importance = parseImportance(reply)
    if (importance === undefined) {
      throw new Error(`Importance rating reply held no number: ${JSON.stringify(reply)}`)
    }
    return importance
  }

  async synthesize(records: readonly MemoryRecord[], mode: SynthesisMode): Promise<string[]> {
    const reply = await this.chat({
      prompt: buildSynthesisPrompt(records, mode, this.maxStatements),
      maxTokens: SYNTHESIS_MAX_TOKENS,
    })
    return parseStatements(reply)
  }

  private createChat(options: HttpLanguageModelOptions, temperature: number): ChatFn {
    const baseURL = options.baseUrl ? { baseURL: options.baseUrl } : {}
    if (this.provider === "anthropic") {
      const apiKey = options.apiKey ?? process.env.LLM_API_KEY ?? process.env.ANTHROPIC_API_KEY
      if (!apiKey) throw new Error("LLM_API_KEY (or ANTHROPIC_API_KEY) is required")
      return anthropicChat(new Anthropic({ apiKey, ...baseURL }), this.model, temperature)
    }

    const apiKey = options.apiKey ?? process.env.LLM_API_KEY ?? process.env.OPENAI_API_KEY
    if (!apiKey) throw new Error("LLM_API_KEY (or OPENAI_API_KEY) is required")
    return openAIChat(new OpenAI({ apiKey, ...baseURL }), this.model, temperature)
  }
}

function defaultModel(provider: LlmProvider): string {
  return provider === "anthropic" ? "claude-sonnet-4-5-20250929" : "gpt-4o"
}
