export { buildImportancePrompt, parseImportance } from "./importance.js"
export { buildSynthesisPrompt, parseStatements, StatementsResponseSchema } from "./synthesis.js"
