import { Match } from "effect"

import type { Token } from "./token.js"
import { tokenToValue } from "./token.js"
import type { Value } from "./value.js"
import { formatNumber } from "./value.js"

// CHANGE: serialize parse results for stdout by walking the tree
// WHY: plain JS objects hoist integer-like keys and numbers lose digits past 2^53
// QUOTE(TZ): "insertion order preserved for first-seen keys"
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ ObjectValue: keys(renderValue(o)) appear in o.entries order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object members are printed in entry order; output never ends with a newline
// COMPLEXITY: O(n)

// Layout follows JSON.stringify: empty containers stay on one line, and with
// indent 0 there is no whitespace at all.
const renderContainer = (
  open: string,
  close: string,
  members: ReadonlyArray<string>,
  indent: string,
  depth: number
): string => {
  if (members.length === 0) {
    return `${open}${close}`
  }
  if (indent === "") {
    return `${open}${members.join(",")}${close}`
  }
  const inner = `\n${indent.repeat(depth + 1)}`
  return `${open}${inner}${members.join(`,${inner}`)}\n${indent.repeat(depth)}${close}`
}

const renderNode = (value: Value, indent: string, depth: number): string =>
  Match.value(value).pipe(
    Match.tagsExhaustive({
      Object: (node) =>
        renderContainer(
          "{",
          "}",
          [...node.entries].map(([key, entry]) =>
            `${JSON.stringify(key)}:${indent === "" ? "" : " "}${renderNode(entry, indent, depth + 1)}`
          ),
          indent,
          depth
        ),
      Array: (node) =>
        renderContainer("[", "]", node.items.map((item) => renderNode(item, indent, depth + 1)), indent, depth),
      String: (node) => JSON.stringify(node.value),
      Integer: (node) => formatNumber(node),
      Float: (node) => formatNumber(node)
    })
  )

/**
 * Print a tree as JSON text.
 *
 * @param indent - Spaces per nesting level; 0 prints a single line.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderValue = (value: Value, indent: number): string => renderNode(value, " ".repeat(indent), 0)

export const renderTokens = (tokens: ReadonlyArray<Token>): string =>
  tokens.map((token) => renderValue(tokenToValue(token), 0)).join("\n")
