import { describe, expect, it } from "vitest"

import { TiktokenCounter } from "../adapters/tiktoken-counter.js"

describe("TiktokenCounter", () => {
  const counter = new TiktokenCounter()

  it("counts nothing for empty text", () => {
    expect(counter.count("")).toBe(0)
  })

  it("counts cl100k_base tokens", () => {
    expect(counter.count("hello world")).toBe(2)
  })

  it("never counts joined pieces as more than their parts", () => {
    const a = "You are Ada.\n"
    const b = "- Bob likes green tea\n"
    expect(counter.count(a + b)).toBeLessThanOrEqual(counter.count(a) + counter.count(b))
  })
})
