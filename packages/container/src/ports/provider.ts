import type { Token } from "../core/token"
import type { Resolver } from "./resolver"

type ProviderBase<T> = {
  provide: Token<T>

  /** Distinguishes several providers of the same token. */
  name?: string
}

export type FactoryProvider<T> = ProviderBase<T> & {
  useFactory: (resolver: Resolver) => T

  /** Adds the value to a group instead of binding it. Cannot be combined with `name`. */
  group?: string
}

export type ValueProvider<T> = ProviderBase<T> & {
  useValue: T
}

export type Provider<T> = FactoryProvider<T> | ValueProvider<T>

export type Invocation = (resolver: Resolver) => void
