function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Safety:
 * - maxDepth guardrail (default 50)
 * - cycle detection via WeakSet
 *
 * @example
 * ```ts
 * const root = errorChain(err).at(-1)
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * First value in the cause chain that satisfies `predicate`.
 */
export function findInChain<T>(
  err: unknown,
  predicate: (value: unknown) => value is T,
): T | undefined {
  for (const value of errorChain(err)) {
    if (predicate(value)) return value
  }

  return undefined
}
