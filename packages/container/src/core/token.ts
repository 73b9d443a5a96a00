import type { Resolver } from "../ports/resolver"

/** One node of the provider graph, as rendered by `Container.visualize`. */
export type ProviderNode = {
  readonly id: number
  readonly label: string
  readonly kind: "provider" | "invocation"
  readonly edges: Set<ProviderNode>
}

export type BindingState<T> =
  | { status: "pending" }
  | { status: "resolving" }
  | { status: "resolved"; value: T }
  | { status: "failed"; error: unknown }

export class Binding<T> {
  state: BindingState<T> = { status: "pending" }

  constructor(
    readonly node: ProviderNode,
    readonly factory: (resolver: Resolver) => T,
  ) {}
}

/**
 * Typed key of a provider.
 *
 * Bindings are stored on the token itself, keyed by the owning container's
 * scope, so looking one up keeps its type.
 */
export class Token<T> {
  private readonly named = new WeakMap<object, Map<string | undefined, Binding<T>>>()
  private readonly groups = new WeakMap<object, Map<string, Binding<T>[]>>()

  constructor(readonly description: string) {}

  /** @internal */
  binding(scope: object, name?: string): Binding<T> | undefined {
    return this.named.get(scope)?.get(name)
  }

  /** @internal */
  bind(scope: object, name: string | undefined, binding: Binding<T>): void {
    const bindings = this.named.get(scope) ?? new Map<string | undefined, Binding<T>>()

    bindings.set(name, binding)
    this.named.set(scope, bindings)
  }

  /** @internal */
  members(scope: object, group: string): readonly Binding<T>[] {
    return this.groups.get(scope)?.get(group) ?? []
  }

  /** @internal */
  join(scope: object, group: string, binding: Binding<T>): void {
    const groups = this.groups.get(scope) ?? new Map<string, Binding<T>[]>()

    groups.set(group, [...(groups.get(group) ?? []), binding])
    this.groups.set(scope, groups)
  }

  toString(): string {
    return this.description
  }
}

export function token<T>(description: string): Token<T> {
  return new Token<T>(description)
}

export function describeKey(
  token: Token<unknown>,
  key: { name?: string | undefined; group?: string | undefined } = {},
): string {
  if (key.name !== undefined) return `${token.description}[name="${key.name}"]`
  if (key.group !== undefined) return `${token.description}[group="${key.group}"]`

  return token.description
}
