import * as Either from "effect/Either"

import type { Cursor, Step } from "./cursor.js"
import { advance, peek, remainder, step } from "./cursor.js"
import type { ParseError } from "./parse-error.js"
import { invalidNumber } from "./parse-error.js"
import type { NumberValue } from "./value.js"
import { approximateNumber, exactNumber } from "./value.js"

// CHANGE: decode numeric literals and pick an exact or approximate representation
// WHY: literals that are mathematically integers must not lose precision through a float
// FORMAT THEOREM: ∀l: frac(l) = ∅ ∧ exp(l) ≥ 0 → decode(l).exact = int(l) · 10^exp(l)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: exactly one of exact/approximate is set; literal is re-joined from the parsed parts
// COMPLEXITY: O(n + log E) big integer multiplications

export interface Exponent {
  readonly marker: "e" | "E"
  readonly sign: "" | "+" | "-"
  readonly digits: string
}

export interface NumberParts {
  readonly negative: boolean
  readonly integer: string
  readonly fraction: string | undefined
  readonly exponent: Exponent | undefined
}

export type NumberDecodeOptions = {
  readonly maxExponent: number
}

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const scanDigits = (cursor: Cursor): Step<string> => {
  let current = cursor
  const digits: Array<string> = []
  while (true) {
    const char = peek(current)
    if (char === undefined || !isDigit(char)) {
      return step(digits.join(""), current)
    }
    digits.push(char)
    current = advance(current)
  }
}

const scanExponent = (cursor: Cursor): Step<Exponent> | undefined => {
  const marker = peek(cursor)
  if (marker !== "e" && marker !== "E") {
    return undefined
  }
  const signChar = peek(advance(cursor))
  const sign = signChar === "+" || signChar === "-" ? signChar : ""
  const digits = scanDigits(advance(cursor, sign === "" ? 1 : 2))
  return step({ marker, sign, digits: digits.value }, digits.cursor)
}

/**
 * Split a numeric literal into sign, integer, fraction and exponent runs.
 *
 * @param cursor - Cursor on `-` or a digit.
 * @returns The parts and the cursor after the literal, or undefined on a grammar violation.
 *
 * @pure true
 * @invariant integer has no leading zero unless it is exactly "0"
 * @complexity O(n)
 */
export const scanNumber = (cursor: Cursor): Step<NumberParts> | undefined => {
  const negative = peek(cursor) === "-"
  const integer = scanDigits(negative ? advance(cursor) : cursor)
  if (integer.value.length === 0) {
    return undefined
  }
  if (integer.value.length > 1 && integer.value.startsWith("0")) {
    return undefined
  }
  let current = integer.cursor
  let fraction: string | undefined
  if (peek(current) === ".") {
    const digits = scanDigits(advance(current))
    if (digits.value.length === 0) {
      return undefined
    }
    fraction = digits.value
    current = digits.cursor
  }
  const exponent = scanExponent(current)
  if (exponent !== undefined && exponent.value.digits.length === 0) {
    return undefined
  }
  return step(
    { negative, integer: integer.value, fraction, exponent: exponent?.value },
    exponent?.cursor ?? current
  )
}

export const joinLiteral = (parts: NumberParts): string =>
  (parts.negative ? "-" : "") +
  parts.integer +
  (parts.fraction === undefined ? "" : `.${parts.fraction}`) +
  (parts.exponent === undefined ? "" : parts.exponent.marker + parts.exponent.sign + parts.exponent.digits)

const countTrailingZeros = (digits: string): number => {
  let index = digits.length
  while (index > 0 && digits[index - 1] === "0") {
    index -= 1
  }
  return digits.length - index
}

const signed = (value: bigint, negative: boolean): bigint => negative ? -value : value

const signedFloat = (value: number, negative: boolean): number => negative ? -value : value

const scaleExact = (
  mantissa: bigint,
  power: bigint,
  options: NumberDecodeOptions,
  magnitude: bigint
): bigint | undefined => {
  if (mantissa === 0n) {
    return 0n
  }
  if (magnitude > BigInt(options.maxExponent)) {
    return undefined
  }
  return mantissa * 10n ** power
}

const decodeWithoutFraction = (
  parts: NumberParts,
  literal: string,
  options: NumberDecodeOptions
): NumberValue | undefined => {
  const exponent = parts.exponent
  if (exponent === undefined) {
    return exactNumber(signed(BigInt(parts.integer), parts.negative), literal)
  }
  const magnitude = BigInt(exponent.digits)
  if (exponent.sign === "-") {
    if (magnitude <= BigInt(countTrailingZeros(parts.integer))) {
      const kept = parts.integer.slice(0, parts.integer.length - Number(magnitude))
      return exactNumber(signed(BigInt(kept === "" ? "0" : kept), parts.negative), literal)
    }
    return approximateNumber(Number(literal), literal)
  }
  const exact = scaleExact(BigInt(parts.integer), magnitude, options, magnitude)
  return exact === undefined ? undefined : exactNumber(signed(exact, parts.negative), literal)
}

const decodeWithFraction = (
  parts: NumberParts,
  fraction: string,
  literal: string,
  options: NumberDecodeOptions
): NumberValue | undefined => {
  const decimal = Number(`${parts.integer}.${fraction}`)
  const exponent = parts.exponent
  if (exponent === undefined) {
    return approximateNumber(signedFloat(decimal, parts.negative), literal)
  }
  const magnitude = BigInt(exponent.digits)
  if (exponent.sign === "-") {
    return approximateNumber(signedFloat(decimal * 10 ** -Number(magnitude), parts.negative), literal)
  }
  const fractionDigits = BigInt(fraction.length)
  if (magnitude >= fractionDigits) {
    const exact = scaleExact(BigInt(parts.integer + fraction), magnitude - fractionDigits, options, magnitude)
    return exact === undefined ? undefined : exactNumber(signed(exact, parts.negative), literal)
  }
  return approximateNumber(signedFloat(decimal * 10 ** Number(magnitude), parts.negative), literal)
}

/**
 * Choose the numeric representation for already-scanned literal parts.
 *
 * @param parts - Scanned literal.
 * @param options - Exponent limit for the exact path.
 * @returns The number, or undefined when the value cannot be represented.
 *
 * @pure true
 * @invariant a zero mantissa on the exact path is 0 regardless of maxExponent
 * @complexity O(n + log E)
 */
export const interpretNumber = (
  parts: NumberParts,
  options: NumberDecodeOptions
): NumberValue | undefined => {
  const literal = joinLiteral(parts)
  const decoded = parts.fraction === undefined
    ? decodeWithoutFraction(parts, literal, options)
    : decodeWithFraction(parts, parts.fraction, literal, options)
  if (decoded?.approximate !== undefined && !Number.isFinite(decoded.approximate)) {
    return undefined
  }
  return decoded
}

/**
 * Decode a numeric literal starting at `-` or a digit.
 *
 * @param cursor - Cursor on the first character of the literal.
 * @param options - Exponent limit for the exact path.
 * @returns Either with the number and the cursor after it, or InvalidNumber at the literal.
 *
 * @pure true
 * @invariant failures are positioned at the first character of the literal
 * @complexity O(n + log E)
 */
export const decodeNumber = (
  cursor: Cursor,
  options: NumberDecodeOptions
): Either.Either<Step<NumberValue>, ParseError> => {
  const scanned = scanNumber(cursor)
  if (scanned === undefined) {
    const rest = remainder(cursor)
    return Either.left(invalidNumber(rest, rest, cursor.offset))
  }
  const decoded = interpretNumber(scanned.value, options)
  if (decoded === undefined) {
    return Either.left(invalidNumber(joinLiteral(scanned.value), remainder(cursor), cursor.offset))
  }
  return Either.right(step(decoded, scanned.cursor))
}
