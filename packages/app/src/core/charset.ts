import * as Either from "effect/Either"

// CHANGE: sniff the charset of fixture bytes and decode them to text
// WHY: the decoder consumes text; a leading BOM must survive decoding so profiles can treat it differently
// FORMAT THEOREM: ∀b: decode(b) = Right(d) → (d.bom ↔ d.text starts with U+FEFF)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decoding is fatal; malformed input never becomes replacement characters
// COMPLEXITY: O(n)

export type Encoding = "utf-8" | "utf-16le" | "utf-16be"

export interface DecodedText {
  readonly encoding: Encoding
  readonly bom: boolean
  readonly text: string
}

export type CharsetError = {
  readonly _tag: "CharsetError"
  readonly encoding: Encoding
  readonly message: string
}

const charsetError = (encoding: Encoding, message: string): CharsetError => ({
  _tag: "CharsetError",
  encoding,
  message
})

interface Sniffed {
  readonly encoding: Encoding
  readonly bom: boolean
}

/**
 * Detect the encoding from a byte order mark, or from the zero byte of an ASCII first character.
 *
 * @pure true
 * @complexity O(1)
 */
export const sniffEncoding = (bytes: Uint8Array): Sniffed => {
  const [first, second, third] = bytes
  if (first === 0xef && second === 0xbb && third === 0xbf) {
    return { encoding: "utf-8", bom: true }
  }
  if (first === 0xff && second === 0xfe) {
    return { encoding: "utf-16le", bom: true }
  }
  if (first === 0xfe && second === 0xff) {
    return { encoding: "utf-16be", bom: true }
  }
  if (first === 0x00 && second !== undefined && second !== 0x00) {
    return { encoding: "utf-16be", bom: false }
  }
  if (first !== undefined && first !== 0x00 && second === 0x00) {
    return { encoding: "utf-16le", bom: false }
  }
  return { encoding: "utf-8", bom: false }
}

const swapBytePairs = (bytes: Uint8Array): Uint8Array => {
  const swapped = new Uint8Array(bytes.length)
  for (let index = 0; index + 1 < bytes.length; index += 2) {
    swapped[index] = bytes[index + 1] ?? 0
    swapped[index + 1] = bytes[index] ?? 0
  }
  return swapped
}

const decodeWith = (
  label: "utf-8" | "utf-16le",
  encoding: Encoding,
  bytes: Uint8Array
): Either.Either<string, CharsetError> =>
  Either.try({
    try: () => new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(bytes),
    catch: (error) => charsetError(encoding, error instanceof Error ? error.message : String(error))
  })

/**
 * Decode document bytes to text, keeping a byte order mark as U+FEFF.
 *
 * @param bytes - Raw file contents.
 * @returns Either with the decoded text and detected encoding, or CharsetError.
 *
 * @pure true
 * @invariant UTF-16 input must have an even byte count
 * @complexity O(n)
 */
export const decodeDocument = (bytes: Uint8Array): Either.Either<DecodedText, CharsetError> => {
  const { bom, encoding } = sniffEncoding(bytes)
  if (encoding !== "utf-8" && bytes.length % 2 !== 0) {
    return Either.left(charsetError(encoding, `odd byte count ${bytes.length} for ${encoding}`))
  }
  const decoded = encoding === "utf-16be"
    ? decodeWith("utf-16le", encoding, swapBytePairs(bytes))
    : decodeWith(encoding, encoding, bytes)
  return Either.map(decoded, (text) => ({ encoding, bom, text }))
}
