import { Container, canVisualizeError } from "../container"
import {
  ConstructorError,
  DependencyCycleError,
  DuplicateProviderError,
  InvalidProviderError,
  InvocationError,
  MissingProviderError,
} from "../errors"
import { token } from "../token"

type Config = { url: string }
type Db = { config: Config }
type Handler = { route: string }

const ConfigToken = token<Config>("Config")
const DbToken = token<Db>("Db")
const HandlerToken = token<Handler>("Handler")

describe("Container", () => {
  describe("provide / get", () => {
    it("resolves a factory with its dependencies", () => {
      const container = new Container()

      container.provide({ provide: ConfigToken, useValue: { url: "postgres://test" } })
      container.provide({
        provide: DbToken,
        useFactory: (r) => ({ config: r.get(ConfigToken) }),
      })

      expect(container.get(DbToken)).toEqual({ config: { url: "postgres://test" } })
    })

    it("calls each factory at most once", () => {
      const container = new Container()
      const factory = vi.fn(() => ({ url: "a" }))

      container.provide({ provide: ConfigToken, useFactory: factory })

      const first = container.get(ConfigToken)
      const second = container.get(ConfigToken)

      expect(first).toBe(second)
      expect(factory).toHaveBeenCalledOnce()
    })

    it("does not call factories until something asks for them", () => {
      const container = new Container()
      const factory = vi.fn(() => ({ url: "a" }))

      container.provide({ provide: ConfigToken, useFactory: factory })

      expect(factory).not.toHaveBeenCalled()
    })

    it("keeps named providers apart from the default one", () => {
      const container = new Container()

      container.provide({ provide: ConfigToken, useValue: { url: "default" } })
      container.provide({ provide: ConfigToken, name: "replica", useValue: { url: "replica" } })

      expect(container.get(ConfigToken).url).toBe("default")
      expect(container.get(ConfigToken, "replica").url).toBe("replica")
    })

    it("rejects a second provider for the same token and name", () => {
      const container = new Container()

      container.provide({ provide: ConfigToken, name: "primary", useValue: { url: "a" } })

      expect(() =>
        container.provide({ provide: ConfigToken, name: "primary", useValue: { url: "b" } }),
      ).toThrowError(new DuplicateProviderError('Config[name="primary"]'))
    })

    it("rejects name and group together", () => {
      const container = new Container()

      const act = () =>
        container.provide({
          provide: HandlerToken,
          name: "a",
          group: "routes",
          useFactory: () => ({ route: "/" }),
        })

      expect(act).toThrow(InvalidProviderError)
      expect(act).toThrow("name and group are mutually exclusive")
    })

    it("rejects a provider with both a value and a factory", () => {
      const container = new Container()

      expect(() =>
        container.provide({
          provide: ConfigToken,
          useValue: { url: "a" },
          useFactory: () => ({ url: "b" }),
        }),
      ).toThrow("invalid provider for Config: exactly one of useFactory or useValue is required")
    })

    it("isolates bindings between containers sharing a token", () => {
      const a = new Container()
      const b = new Container()

      a.provide({ provide: ConfigToken, useValue: { url: "a" } })

      expect(a.get(ConfigToken).url).toBe("a")
      expect(() => b.get(ConfigToken)).toThrow(MissingProviderError)
    })
  })

  describe("optional", () => {
    it("returns undefined when nothing provides the token", () => {
      const container = new Container()

      container.provide({
        provide: DbToken,
        useFactory: (r) => ({ config: r.optional(ConfigToken) ?? { url: "fallback" } }),
      })

      expect(container.get(DbToken).config.url).toBe("fallback")
    })
  })

  describe("groups", () => {
    it("collects group members in registration order", () => {
      const container = new Container()

      container.provide({ provide: HandlerToken, group: "routes", useFactory: () => ({ route: "/a" }) })
      container.provide({ provide: HandlerToken, group: "routes", useFactory: () => ({ route: "/b" }) })

      expect(container.getGroup(HandlerToken, "routes").map((h) => h.route)).toEqual(["/a", "/b"])
    })

    it("returns an empty list for an unknown group", () => {
      const container = new Container()

      expect(container.getGroup(HandlerToken, "routes")).toEqual([])
    })

    it("hands groups to factories", () => {
      const container = new Container()
      const RoutesToken = token<string[]>("Routes")

      container.provide({ provide: HandlerToken, group: "routes", useValue: { route: "/health" } })
      container.provide({
        provide: RoutesToken,
        useFactory: (r) => r.group(HandlerToken, "routes").map((h) => h.route),
      })

      expect(container.get(RoutesToken)).toEqual(["/health"])
    })
  })

  describe("resolution errors", () => {
    it("reports a missing provider with the requesting path", () => {
      const container = new Container()

      container.provide({
        provide: DbToken,
        useFactory: (r) => ({ config: r.get(ConfigToken) }),
      })

      expect(() => container.get(DbToken)).toThrowError(
        new MissingProviderError("Config", ["Db"]),
      )
      expect(() => container.get(DbToken)).toThrow("missing provider for Config: required by Db")
    })

    it("reports a dependency cycle with its path", () => {
      const container = new Container()
      const A = token<number>("A")
      const B = token<number>("B")

      container.provide({ provide: A, useFactory: (r) => r.get(B) + 1 })
      container.provide({ provide: B, useFactory: (r) => r.get(A) + 1 })

      let caught: unknown

      try {
        container.get(A)
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(DependencyCycleError)
      expect(caught).toMatchObject({
        message: "dependency cycle detected: A -> B -> A",
        cycle: ["A", "B", "A"],
        nodes: ["A", "B"],
      })
    })

    it("wraps a throwing factory and caches the failure", () => {
      const container = new Container()
      const cause = new Error("connection refused")
      const factory = vi.fn((): Db => {
        throw cause
      })

      container.provide({ provide: DbToken, useFactory: factory })

      let first: unknown
      let second: unknown

      try {
        container.get(DbToken)
      } catch (err) {
        first = err
      }

      try {
        container.get(DbToken)
      } catch (err) {
        second = err
      }

      expect(first).toBeInstanceOf(ConstructorError)
      expect(first).toMatchObject({
        message: "failed to build Db: connection refused",
        provider: "Db",
        cause,
      })
      expect(second).toBe(first)
      expect(factory).toHaveBeenCalledOnce()
    })

    it("surfaces the innermost failing provider to dependents", () => {
      const container = new Container()

      container.provide({
        provide: ConfigToken,
        useFactory: () => {
          throw new Error("bad url")
        },
      })
      container.provide({
        provide: DbToken,
        useFactory: (r) => ({ config: r.get(ConfigToken) }),
      })

      expect(() => container.get(DbToken)).toThrow("failed to build Config: bad url")
    })
  })

  describe("invoke", () => {
    it("runs immediately with resolved dependencies", () => {
      const container = new Container()
      const seen: string[] = []

      container.provide({ provide: ConfigToken, useValue: { url: "a" } })
      container.invoke((r) => {
        seen.push(r.get(ConfigToken).url)
      })

      expect(seen).toEqual(["a"])
    })

    it("wraps failures in InvocationError named after the function", () => {
      const container = new Container()

      function migrate(): void {
        throw new Error("nope")
      }

      expect(() => container.invoke(migrate)).toThrowError(
        new InvocationError("migrate", new Error("nope")),
      )
      expect(() => container.invoke(migrate)).toThrow("invocation migrate failed: nope")
    })

    it("numbers anonymous invocations", () => {
      const container = new Container()

      container.invoke(() => {})

      expect(() =>
        container.invoke(() => {
          throw new Error("nope")
        }),
      ).toThrow("invocation #2 failed: nope")
    })

    it("keeps the resolution error as the cause", () => {
      const container = new Container()
      let caught: unknown

      try {
        container.invoke((r) => {
          r.get(ConfigToken)
        }, "boot")
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(InvocationError)
      expect(caught).toMatchObject({
        message: "invocation boot failed: missing provider for Config: required by invoke boot",
      })
      expect(canVisualizeError(caught)).toBe(true)
    })
  })

  describe("build", () => {
    it("instantiates every provider in registration order", () => {
      const container = new Container()
      const order: string[] = []

      container.provide({
        provide: DbToken,
        useFactory: (r) => {
          order.push("db")
          return { config: r.get(ConfigToken) }
        },
      })
      container.provide({
        provide: ConfigToken,
        useFactory: () => {
          order.push("config")
          return { url: "a" }
        },
      })
      container.provide({
        provide: HandlerToken,
        group: "routes",
        useFactory: () => {
          order.push("handler")
          return { route: "/" }
        },
      })

      const graph = container.build()

      expect(order).toEqual(["db", "config", "handler"])
      expect(graph.get(DbToken).config.url).toBe("a")
      expect(graph.getGroup(HandlerToken, "routes")).toHaveLength(1)
    })
  })

  describe("visualize", () => {
    it("renders providers and the edges resolved so far", () => {
      const container = new Container()

      container.provide({ provide: ConfigToken, useValue: { url: "a" } })
      container.provide({ provide: DbToken, useFactory: (r) => ({ config: r.get(ConfigToken) }) })
      container.build()

      expect(container.visualize()).toBe(
        [
          "digraph {",
          "\trankdir=RL;",
          '\tn0 [label="Config"];',
          '\tn1 [label="Db"];',
          "\tn1 -> n0;",
          "}",
        ].join("\n"),
      )
    })

    it("colours the requester and draws the missing provider", () => {
      const container = new Container()

      container.provide({ provide: DbToken, useFactory: (r) => ({ config: r.get(ConfigToken, "primary") }) })

      let caught: unknown

      try {
        container.build()
      } catch (err) {
        caught = err
      }

      expect(container.visualize(caught)).toBe(
        [
          "digraph {",
          "\trankdir=RL;",
          '\tn0 [label="Db" color=red];',
          '\tm0 [label="Config[name=\\"primary\\"]" color=red style=dashed];',
          "\tn0 -> m0;",
          "}",
        ].join("\n"),
      )
    })

    it("draws invocations as boxes", () => {
      const container = new Container()

      container.provide({ provide: ConfigToken, useValue: { url: "a" } })
      container.invoke((r) => {
        r.get(ConfigToken)
      }, "connect")

      expect(container.visualize()).toBe(
        [
          "digraph {",
          "\trankdir=RL;",
          '\tn0 [label="Config"];',
          '\tn1 [label="invoke connect" shape=box];',
          "\tn1 -> n0;",
          "}",
        ].join("\n"),
      )
    })
  })

  describe("canVisualizeError", () => {
    it("finds graph errors anywhere in the cause chain", () => {
      const cycle = new DependencyCycleError(["A", "B", "A"])

      expect(canVisualizeError(new Error("wrapped", { cause: cycle }))).toBe(true)
      expect(canVisualizeError(new Error("plain"))).toBe(false)
      expect(canVisualizeError(undefined)).toBe(false)
    })
  })
})
