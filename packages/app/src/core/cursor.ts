// CHANGE: introduce an immutable code point cursor over the input text
// WHY: positions and context snippets are measured in code points, not UTF-16 units
// FORMAT THEOREM: ∀c: advance(c, n).offset = min(c.offset + n, |c.chars|)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ offset ≤ chars.length
// COMPLEXITY: O(1) per move, O(n) for remainder

export interface Cursor {
  readonly chars: ReadonlyArray<string>
  readonly offset: number
}

export interface Step<A> {
  readonly value: A
  readonly cursor: Cursor
}

export const step = <A>(value: A, cursor: Cursor): Step<A> => ({ value, cursor })

export const makeCursor = (text: string): Cursor => ({ chars: Array.from(text), offset: 0 })

export const peek = (cursor: Cursor): string | undefined => cursor.chars[cursor.offset]

export const isAtEnd = (cursor: Cursor): boolean => cursor.offset >= cursor.chars.length

export const advance = (cursor: Cursor, count = 1): Cursor => ({
  chars: cursor.chars,
  offset: Math.min(cursor.offset + count, cursor.chars.length)
})

/**
 * Unconsumed input from the cursor to the end of the text.
 */
export const remainder = (cursor: Cursor): string => cursor.chars.slice(cursor.offset).join("")

export const take = (cursor: Cursor, count: number): string =>
  cursor.chars.slice(cursor.offset, cursor.offset + count).join("")

const WHITESPACE: ReadonlySet<string> = new Set([" ", "\t", "\n", "\r"])

export const isWhitespace = (char: string): boolean => WHITESPACE.has(char)

/**
 * Skip insignificant whitespace (space, tab, line feed, carriage return).
 *
 * @pure true
 * @invariant peek(result) is undefined or not whitespace
 * @complexity O(k) where k = skipped characters
 */
export const skipWhitespace = (cursor: Cursor): Cursor => {
  let offset = cursor.offset
  while (offset < cursor.chars.length) {
    const char = cursor.chars[offset]
    if (char === undefined || !isWhitespace(char)) {
      break
    }
    offset += 1
  }
  return offset === cursor.offset ? cursor : { chars: cursor.chars, offset }
}
