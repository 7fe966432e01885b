/**
 * Scan engine: classify, carve and decode one token at a time.
 */

export { ByteAccumulator } from './accumulator.ts'
export { decodeToken, trimTrailingSpace } from './decode.ts'
export { extractToken } from './engine.ts'
export { countDelimiters, countTokenBytes, isDelimiter } from './whitespace.ts'
