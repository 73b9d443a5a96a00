import { findInChain } from "@liftoff/errors"
import type { Invocation, Provider } from "../ports/provider"
import type { Graph, Resolver } from "../ports/resolver"
import { renderDot } from "./dot"
import {
  ConstructorError,
  DependencyCycleError,
  DuplicateProviderError,
  InvalidProviderError,
  InvocationError,
  isGraphError,
  MissingProviderError,
} from "./errors"
import { Binding, describeKey, type ProviderNode, type Token } from "./token"

type Entry = {
  node: ProviderNode
  instantiate: () => void
}

/**
 * Typed provider registry.
 *
 * Providers are resolved lazily and at most once; the value (or the failure)
 * is cached per provider. `invoke` runs immediately.
 */
export class Container implements Graph {
  private readonly scope = {}
  private readonly entries: Entry[] = []
  private readonly nodes: ProviderNode[] = []
  private readonly missing: { from?: ProviderNode; label: string }[] = []
  private readonly stack: ProviderNode[] = []

  provide<T>(provider: Provider<T>): void {
    const { provide: key, name } = provider
    const group = "group" in provider ? provider.group : undefined
    const label = describeKey(key, { name, group })

    if (name !== undefined && group !== undefined) {
      throw new InvalidProviderError(label, "name and group are mutually exclusive")
    }

    const factory = toFactory(provider)

    if (!factory) {
      throw new InvalidProviderError(label, "exactly one of useFactory or useValue is required")
    }

    if (group === undefined && key.binding(this.scope, name)) {
      throw new DuplicateProviderError(label)
    }

    const binding = new Binding(this.addNode(label, "provider"), factory)

    if (group === undefined) {
      key.bind(this.scope, name, binding)
    } else {
      key.join(this.scope, group, binding)
    }

    this.entries.push({
      node: binding.node,
      instantiate: () => {
        this.resolve(binding)
      },
    })
  }

  invoke(fn: Invocation, name: string = fn.name || `#${this.countInvocations() + 1}`): void {
    const node = this.addNode(`invoke ${name}`, "invocation")

    this.stack.push(node)

    try {
      fn(this.resolverFor(node))
    } catch (err) {
      throw new InvocationError(name, err)
    } finally {
      this.stack.pop()
    }
  }

  get<T>(token: Token<T>, name?: string): T {
    return this.lookup(token, name, undefined)
  }

  getGroup<T>(token: Token<T>, group: string): T[] {
    return this.collect(token, group, undefined)
  }

  /** Instantiates every provider in registration order. */
  build(): Graph {
    for (const entry of this.entries) {
      entry.instantiate()
    }

    return {
      get: (token, name) => this.get(token, name),
      getGroup: (token, group) => this.getGroup(token, group),
    }
  }

  /**
   * DOT description of the providers and the dependencies resolved so far.
   * Nodes involved in `err` (when it can be visualized) are coloured red.
   */
  visualize(err?: unknown): string {
    const failure = findInChain(err, isGraphError)
    const failed = new Set(failure?.nodes ?? [])
    const missing = failure instanceof MissingProviderError ? this.missing : []

    return renderDot(this.nodes, failed, missing)
  }

  private lookup<T>(token: Token<T>, name: string | undefined, from: ProviderNode | undefined): T {
    const binding = token.binding(this.scope, name)

    if (!binding) {
      const label = describeKey(token, { name })

      this.missing.push({ label, ...(from && { from }) })

      throw new MissingProviderError(
        label,
        this.stack.map((n) => n.label),
      )
    }

    from?.edges.add(binding.node)

    return this.resolve(binding)
  }

  private optional<T>(token: Token<T>, name: string | undefined, from: ProviderNode): T | undefined {
    const binding = token.binding(this.scope, name)

    if (!binding) return undefined

    from.edges.add(binding.node)

    return this.resolve(binding)
  }

  private collect<T>(token: Token<T>, group: string, from: ProviderNode | undefined): T[] {
    return token.members(this.scope, group).map((binding) => {
      from?.edges.add(binding.node)

      return this.resolve(binding)
    })
  }

  private resolve<T>(binding: Binding<T>): T {
    const { state, node } = binding

    switch (state.status) {
      case "resolved":
        return state.value

      case "failed":
        throw state.error

      case "resolving": {
        const start = this.stack.indexOf(node)
        const cycle = [...this.stack.slice(start), node].map((n) => n.label)

        throw new DependencyCycleError(cycle)
      }

      case "pending":
        break
    }

    binding.state = { status: "resolving" }
    this.stack.push(node)

    try {
      const value = binding.factory(this.resolverFor(node))

      binding.state = { status: "resolved", value }

      return value
    } catch (err) {
      const error = isGraphError(err) ? err : new ConstructorError(node.label, err)

      binding.state = { status: "failed", error }

      throw error
    } finally {
      this.stack.pop()
    }
  }

  private resolverFor(node: ProviderNode): Resolver {
    return {
      get: (token, name) => this.lookup(token, name, node),
      optional: (token, name) => this.optional(token, name, node),
      group: (token, group) => this.collect(token, group, node),
    }
  }

  private addNode(label: string, kind: ProviderNode["kind"]): ProviderNode {
    const node: ProviderNode = { id: this.nodes.length, label, kind, edges: new Set() }

    this.nodes.push(node)

    return node
  }

  private countInvocations(): number {
    return this.nodes.filter((n) => n.kind === "invocation").length
  }
}

function toFactory<T>(provider: Provider<T>): ((resolver: Resolver) => T) | undefined {
  const hasValue = "useValue" in provider
  const hasFactory = "useFactory" in provider && typeof provider.useFactory === "function"

  if (hasValue === hasFactory) return undefined
  if ("useValue" in provider) {
    const { useValue } = provider

    return () => useValue
  }

  return provider.useFactory
}

export function canVisualizeError(err: unknown): boolean {
  return findInChain(err, isGraphError) !== undefined
}
