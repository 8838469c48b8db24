import * as Either from "effect/Either"

// CHANGE: share one quote/escape/depth state machine between object and array scanning
// WHY: nested brackets and quoted commas must never split a token
// QUOTE(TZ): "commas inside nested {}/[] or inside quoted strings do not split"
// REF: req-scan-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: split(s) = Right(ts) → join(ts, ",") = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: depth changes only outside quotes; an escaped quote never toggles inQuotes
// COMPLEXITY: O(n)/O(n)

export type ScanIssue = "unterminated string" | "unbalanced brackets"

export interface ScanState {
  readonly inQuotes: boolean
  readonly escaped: boolean
  readonly depth: number
}

export const initialScanState: ScanState = { inQuotes: false, escaped: false, depth: 0 }

const consumeQuoted = (state: ScanState, char: string): ScanState => {
  if (state.escaped) {
    return { ...state, escaped: false }
  }
  if (char === "\\") {
    return { ...state, escaped: true }
  }
  if (char === "\"") {
    return { ...state, inQuotes: false }
  }
  return state
}

const consumeUnquoted = (state: ScanState, char: string): ScanState => {
  if (char === "\"") {
    return { ...state, inQuotes: true }
  }
  if (char === "{" || char === "[") {
    return { ...state, depth: state.depth + 1 }
  }
  if (char === "}" || char === "]") {
    return { ...state, depth: state.depth - 1 }
  }
  return state
}

/**
 * Advance the scanner over one character.
 *
 * @pure true
 * @complexity O(1)
 */
export const advance = (state: ScanState, char: string): ScanState =>
  state.inQuotes ? consumeQuoted(state, char) : consumeUnquoted(state, char)

export const isTopLevel = (state: ScanState): boolean => !state.inQuotes && state.depth === 0

/**
 * Deepest bracket nesting reached anywhere in the text, ignoring quoted brackets.
 *
 * @pure true
 * @complexity O(n)
 */
export const maxDepth = (text: string): number => {
  let state = initialScanState
  let deepest = 0
  for (const char of text) {
    state = advance(state, char)
    deepest = Math.max(deepest, state.depth)
  }
  return deepest
}

const finalIssue = (state: ScanState): ScanIssue | undefined => {
  if (state.inQuotes) {
    return "unterminated string"
  }
  return state.depth === 0 ? undefined : "unbalanced brackets"
}

/**
 * Split a container interior at top-level commas.
 *
 * @param interior - Text between the outer brackets.
 * @returns Either with the raw (untrimmed) segments or the reason the scan failed.
 *
 * @pure true
 * @invariant segments.length = number of top-level commas + 1
 * @complexity O(n)
 */
export const splitTopLevel = (interior: string): Either.Either<ReadonlyArray<string>, ScanIssue> => {
  const segments: Array<string> = []
  let state = initialScanState
  let current = ""
  for (const char of interior) {
    if (char === "," && isTopLevel(state)) {
      segments.push(current)
      current = ""
      continue
    }
    state = advance(state, char)
    if (state.depth < 0) {
      return Either.left("unbalanced brackets")
    }
    current += char
  }
  const issue = finalIssue(state)
  if (issue !== undefined) {
    return Either.left(issue)
  }
  segments.push(current)
  return Either.right(segments)
}

export interface RawPair {
  readonly key: string
  // undefined when no top-level colon was seen for this pair
  readonly value: string | undefined
}

type Mode = "key" | "value"

interface PairScan {
  readonly pairs: ReadonlyArray<RawPair>
  readonly mode: Mode
  readonly key: string
  readonly value: string
}

const closePair = (scan: PairScan): PairScan => ({
  pairs: [...scan.pairs, { key: scan.key, value: scan.mode === "value" ? scan.value : undefined }],
  mode: "key",
  key: "",
  value: ""
})

const appendChar = (scan: PairScan, char: string): PairScan =>
  scan.mode === "key"
    ? { ...scan, key: scan.key + char }
    : { ...scan, value: scan.value + char }

const hasTrailingPair = (scan: PairScan): boolean =>
  scan.pairs.length > 0 || scan.mode === "value" || scan.key.trim().length > 0

/**
 * Scan an object interior into raw key/value pairs.
 *
 * Only the first top-level colon of a pair switches to value mode; later
 * colons are kept in the value text.
 *
 * @param interior - Text between the outer braces.
 * @returns Either with raw pairs in source order or the reason the scan failed.
 *
 * @pure true
 * @invariant an empty or whitespace-only interior yields no pairs
 * @complexity O(n)
 */
export const scanPairs = (interior: string): Either.Either<ReadonlyArray<RawPair>, ScanIssue> => {
  let state = initialScanState
  let scan: PairScan = { pairs: [], mode: "key", key: "", value: "" }
  for (const char of interior) {
    if (isTopLevel(state) && char === ",") {
      scan = closePair(scan)
      continue
    }
    if (isTopLevel(state) && char === ":" && scan.mode === "key") {
      scan = { ...scan, mode: "value" }
      continue
    }
    state = advance(state, char)
    if (state.depth < 0) {
      return Either.left("unbalanced brackets")
    }
    scan = appendChar(scan, char)
  }
  const issue = finalIssue(state)
  if (issue !== undefined) {
    return Either.left(issue)
  }
  return Either.right(hasTrailingPair(scan) ? closePair(scan).pairs : scan.pairs)
}
