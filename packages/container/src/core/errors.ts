import { BaseError } from "@liftoff/errors"

/**
 * Failures that point at nodes of the provider graph.
 *
 * `nodes` holds the labels `Container.visualize` colours red.
 */
export abstract class GraphError<C extends Lowercase<string>> extends BaseError<C> {
  abstract readonly nodes: readonly string[]
}

export class InvalidProviderError extends BaseError<"invalid_provider"> {
  constructor(provider: string, reason: string) {
    super(`invalid provider for ${provider}: ${reason}`, {
      code: "invalid_provider",
      context: { provider, reason },
      isOperational: false,
    })
  }
}

export class DuplicateProviderError extends BaseError<"duplicate_provider"> {
  constructor(provider: string) {
    super(`${provider} is already provided`, {
      code: "duplicate_provider",
      context: { provider },
      isOperational: false,
    })
  }
}

export class MissingProviderError extends GraphError<"missing_provider"> {
  readonly nodes: readonly string[]

  constructor(
    readonly missing: string,
    readonly path: readonly string[],
  ) {
    const requiredBy = path.length > 0 ? `: required by ${path.join(" -> ")}` : ""

    super(`missing provider for ${missing}${requiredBy}`, {
      code: "missing_provider",
      context: { missing, path },
      isOperational: false,
    })

    this.nodes = path.slice(-1)
  }
}

export class DependencyCycleError extends GraphError<"dependency_cycle"> {
  readonly nodes: readonly string[]

  constructor(readonly cycle: readonly string[]) {
    super(`dependency cycle detected: ${cycle.join(" -> ")}`, {
      code: "dependency_cycle",
      context: { cycle },
      isOperational: false,
    })

    this.nodes = [...new Set(cycle)]
  }
}

export class ConstructorError extends GraphError<"constructor_failed"> {
  readonly nodes: readonly string[]

  constructor(
    readonly provider: string,
    cause: unknown,
  ) {
    super(`failed to build ${provider}: ${describeCause(cause)}`, {
      code: "constructor_failed",
      context: { provider },
      cause,
    })

    this.nodes = [provider]
  }
}

export class InvocationError extends BaseError<"invocation_failed"> {
  constructor(
    readonly invocation: string,
    cause: unknown,
  ) {
    super(`invocation ${invocation} failed: ${describeCause(cause)}`, {
      code: "invocation_failed",
      context: { invocation },
      cause,
    })
  }
}

export function isGraphError(value: unknown): value is GraphError<Lowercase<string>> {
  return value instanceof GraphError
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
