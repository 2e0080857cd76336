import type { TokenCounter } from "@mnemos/engine"
import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken"

/** Exact BPE token counts for OpenAI-family models. */
export class TiktokenCounter implements TokenCounter {
  private readonly encoder: Tiktoken

  constructor(encoding: TiktokenEncoding = "cl100k_base") {
    this.encoder = getEncoding(encoding)
  }

  count(text: string): number {
    if (text.length === 0) return 0
    return this.encoder.encode(text).length
  }
}
