import { ObjectConfig } from "../../adapters/object/object-config"
import { UsageError } from "../errors"
import { func, key, method, value } from "../getters"
import { param } from "../param"
import {
  loadCollection,
  recursiveLoad,
  recursiveLoadFromDictValues,
  recursiveLoadFromList,
} from "../recursive"
import { defineConfigs, defineParams } from "../registry"

const env = new ObjectConfig({ HOST: "db.test", PORT: "5432", USER: "knight" }, { kind: "env", name: "env" })

describe("recursiveLoad", () => {
  it("loads nested objects with the parent's configs", () => {
    class Database {
      host!: string
    }
    defineParams(Database, { host: param([key("env", "HOST")]) })

    class App {
      user!: string
      readonly db = new Database()
    }
    defineParams(App, { user: param([key("env", "USER")]) })
    defineConfigs(App, () => env)

    const app = recursiveLoad(new App())

    expect(app.user).toBe("knight")
    expect(app.db.host).toBe("db.test")
  })

  it("uses a nested object's own provider", () => {
    class Cache {
      host!: string
    }
    defineParams(Cache, { host: param([key("env", "HOST")]) })
    defineConfigs(Cache, () => new ObjectConfig({ HOST: "cache.test" }, { kind: "env" }))

    class App {
      readonly cache = new Cache()
    }

    const app = recursiveLoad(new App(), { configs: env })

    expect(app.cache.host).toBe("cache.test")
  })

  it("descends through arrays, plain objects and Maps", () => {
    let loads = 0

    class Worker {
      id!: number
    }
    defineParams(Worker, { id: param([func(() => ++loads)]) })

    class Pool {
      readonly workers = [new Worker(), { nested: new Worker() }]
      readonly byName = new Map([["main", new Worker()]])
      readonly label = "pool"
    }

    const pool = recursiveLoad(new Pool(), { configs: [] })

    expect(loads).toBe(3)
    expect(pool.workers[0]).toMatchObject({ id: 1 })
    expect(pool.byName.get("main")).toMatchObject({ id: 3 })
  })

  it("loads an object reachable twice only once", () => {
    let loads = 0

    class Shared {
      n!: number
    }
    defineParams(Shared, { n: param([func(() => ++loads)]) })

    class Holder {
      readonly shared = new Shared()
      readonly again = [this.shared]
      self: unknown = this
    }

    const holder = recursiveLoad(new Holder(), { configs: [] })

    expect(loads).toBe(1)
    expect(holder.shared.n).toBe(1)
  })

  it("treats other objects as leaves", () => {
    class Target {
      when = new Date(0)
      name!: string
    }
    defineParams(Target, { name: param([value("x")]) })

    expect(recursiveLoad(new Target(), { configs: [] }).name).toBe("x")
  })
})

describe("recursiveLoadFromList and recursiveLoadFromDictValues", () => {
  class Node {
    host!: string
  }
  defineParams(Node, { host: param([key("env", "HOST")]) })

  it("loads every item with the given configs", () => {
    const nodes = [new Node(), new Node()]

    recursiveLoadFromList(nodes, { configs: env })

    expect(nodes.map((node) => node.host)).toEqual(["db.test", "db.test"])
  })

  it("loads mapping and Map values", () => {
    const record = { primary: new Node() }
    const map = new Map([["replica", new Node()]])

    recursiveLoadFromDictValues(record, { configs: env })
    recursiveLoadFromDictValues(map, { configs: env })

    expect(record.primary.host).toBe("db.test")
    expect(map.get("replica")?.host).toBe("db.test")
  })
})

describe("loadCollection", () => {
  it("replaces parameters stored in nested containers", () => {
    const settings = {
      db: { host: param([key("env", "HOST")]), port: param([key("env", "PORT")], { apply: (v) => Number(v) }) },
      replicas: [param([value("r1")]), "static"],
      extra: new Map<string, unknown>([["timeout", param([], { default: 30 })]]),
    }

    loadCollection(settings, env)

    expect(settings).toEqual({
      db: { host: "db.test", port: 5432 },
      replicas: ["r1", "static"],
      extra: new Map([["timeout", 30]]),
    })
  })

  it("lets slots depend on each other by key path", () => {
    const settings = {
      url: param([method((_, ctx) => `postgres://${String(ctx.resolve("db.host"))}`)]),
      db: { host: param([key("env", "HOST")]) },
    }

    loadCollection(settings, env)

    expect(settings.url).toBe("postgres://db.test")
  })

  it("reports unresolved slots by path", () => {
    const settings = { db: { password: param([key("env", "PASSWORD")]) }, list: [param([])] }

    expect(() => loadCollection(settings, env)).toThrow(
      [
        "cannot load collection: 2 parameters could not be resolved",
        "  no value found for collection.db.password (tried env PASSWORD)",
        "  no value found for collection.list[0] (no getters declared)",
      ].join("\n"),
    )
  })

  it("rejects Map keys that render to the same path", () => {
    const first = param([key("env", "HOST")])
    const second = param([key("env", "PORT")])
    const byOwner = new Map<object, unknown>([
      [{ id: 1 }, first],
      [{ id: 2 }, second],
    ])

    expect(() => loadCollection(byOwner, env)).toThrow(UsageError)
    expect([...byOwner.values()]).toEqual([first, second])
  })

  it("rejects non-containers", () => {
    expect(() => loadCollection(new Date(), env)).toThrow(UsageError)
  })
})
