import * as Either from "effect/Either"
import type * as Equivalence from "effect/Equivalence"
import * as Option from "effect/Option"

import type { MismatchedExpectation, OutOfBounds } from "./errors.js"
import { mismatchedExpectation, outOfBounds } from "./errors.js"

// CHANGE: introduce a forward-only cursor over an indexable sequence
// WHY: tokenizer and parser share one positional reader with the same failure model
// QUOTE(TZ): "a positional, non-rewindable forward reader over a fixed-length ordered sequence"
// REF: req-reader-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: r.position() before advance ≤ r.position() after advance
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ position ≤ length and position never decreases
// COMPLEXITY: O(1) per operation

export interface CursorReader<A> {
  readonly length: number
  readonly peek: () => Option.Option<A>
  readonly advance: () => Either.Either<A, OutOfBounds>
  readonly position: () => number
  readonly isExhausted: () => boolean
}

/**
 * Create a reader positioned at the first element of `data`.
 *
 * @param data - Sequence the reader walks; it is not copied.
 * @returns CursorReader owning its own position.
 *
 * @pure false
 * @invariant position starts at 0
 * @complexity O(1)
 */
export const makeReader = <A>(data: ReadonlyArray<A>): CursorReader<A> => {
  const length = data.length
  let cursor = 0

  const elementAt = (index: number): Option.Option<A> =>
    index < length ? Option.fromNullable(data[index]) : Option.none()

  return {
    length,
    peek: () => elementAt(cursor),
    advance: () => {
      const current = elementAt(cursor)
      if (Option.isNone(current)) {
        return Either.left(outOfBounds(cursor))
      }
      cursor += 1
      return Either.right(current.value)
    },
    position: () => cursor,
    isExhausted: () => cursor >= length
  }
}

/**
 * Advance the reader and require the element to match `expected`.
 *
 * @param reader - Reader to advance.
 * @param expected - Element that must come next.
 * @param equivalence - Element comparison.
 * @param show - Renders elements for the mismatch diagnostic.
 *
 * @pure false
 * @invariant the reader advances by exactly one on success and on mismatch
 * @complexity O(1)
 */
export const consume = <A>(
  reader: CursorReader<A>,
  expected: A,
  equivalence: Equivalence.Equivalence<A>,
  show: (element: A) => string
): Either.Either<void, OutOfBounds | MismatchedExpectation> => {
  const actual = reader.advance()
  if (Either.isLeft(actual)) {
    return Either.left(actual.left)
  }
  if (!equivalence(actual.right, expected)) {
    return Either.left(mismatchedExpectation(show(expected), show(actual.right)))
  }
  return Either.right(undefined)
}
