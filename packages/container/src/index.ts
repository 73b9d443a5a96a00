export { Container, canVisualizeError } from "./core/container"
export {
  ConstructorError,
  DependencyCycleError,
  DuplicateProviderError,
  GraphError,
  InvalidProviderError,
  InvocationError,
  isGraphError,
  MissingProviderError,
} from "./core/errors"
export { describeKey, Token, token } from "./core/token"
export type { FactoryProvider, Invocation, Provider, ValueProvider } from "./ports/provider"
export type { Graph, Resolver } from "./ports/resolver"
