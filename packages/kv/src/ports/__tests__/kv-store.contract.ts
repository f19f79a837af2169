import { sleep } from "../../tests/sleep"
import { bytes, collectKeys, entry, keys } from "../../tests/utils/kv-test-helpers"
import type { BytesKeyValueStore } from "../bytes-kv-store"
import type { KvEntry } from "../kv-value"

type CreateBytesKvStore = () => BytesKeyValueStore

export function describeKvStoreContract(
  adapterName: string,
  createStore: CreateBytesKvStore,
): void {
  describe(`BytesKeyValueStore contract - ${adapterName}`, () => {
    let store: BytesKeyValueStore

    beforeEach(() => {
      store = createStore()
    })

    describe("get / set", () => {
      it("reads not_found for a key never written", async () => {
        expect(await store.get("absent")).toStrictEqual({ kind: "not_found" })
      })

      it("reads back exactly the bytes written", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        expect(await store.get(key)).toStrictEqual({ kind: "found", value })
      })

      it("replaces the value on a second write", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.one(), bytes.b())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("is not affected by later mutation of the written or returned array", async () => {
        const value = bytes.a()

        await store.set(keys.one(), value)
        value[0] = 42

        const first = await store.get(keys.one())
        if (first.kind === "found") first.value[1] = 42

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })
    })

    describe("delete / has", () => {
      it("deleting an absent key does not throw", async () => {
        await expect(store.delete("absent")).resolves.toBeUndefined()
      })

      it("a deleted key reads not_found and has() is false", async () => {
        await store.set(keys.one(), bytes.a())
        await store.delete(keys.one())
        await store.delete(keys.one())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
        expect(await store.has(keys.one())).toBe(false)
      })

      it("has() agrees with get()", async () => {
        expect(await store.has(keys.one())).toBe(false)

        await store.set(keys.one(), bytes.a())

        expect(await store.has(keys.one())).toBe(true)
        expect((await store.get(keys.one())).kind).toBe("found")
      })
    })

    describe("getMany", () => {
      it("returns an empty map for no keys", async () => {
        expect(await store.getMany([])).toStrictEqual(new Map())
      })

      it("reports found and not_found per key", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.two(), bytes.empty())

        const res = await store.getMany([keys.one(), "absent", keys.two()])

        expect(res).toStrictEqual(
          new Map([
            [keys.one(), { kind: "found", value: bytes.a() }],
            ["absent", { kind: "not_found" }],
            [keys.two(), { kind: "found", value: bytes.empty() }],
          ]),
        )
      })

      it("answers once per distinct key", async () => {
        await store.set(keys.one(), bytes.a())

        const res = await store.getMany([keys.one(), "absent", keys.one(), "absent"])

        expect(res.size).toBe(2)
        expect(res.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })
    })

    describe("setMany / deleteMany", () => {
      it("accept empty input", async () => {
        await expect(store.setMany([])).resolves.toBeUndefined()
        await expect(store.deleteMany([])).resolves.toBeUndefined()
      })

      it("setMany writes every entry", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
        ])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("setMany keeps the last value of a repeated key", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.one(), bytes.c()],
        ])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.c() })
      })

      it("deleteMany removes present keys and skips absent or repeated ones", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
          [keys.three(), bytes.c()],
        ])

        await store.deleteMany([keys.one(), "absent", keys.two(), keys.one()])

        const res = await store.getMany([keys.one(), keys.two(), keys.three()])

        expect(res.get(keys.one())).toStrictEqual({ kind: "not_found" })
        expect(res.get(keys.two())).toStrictEqual({ kind: "not_found" })
        expect(res.get(keys.three())).toStrictEqual({ kind: "found", value: bytes.c() })
      })
    })

    describe("keys", () => {
      it("yields nothing for an empty store", async () => {
        expect(await collectKeys(store.keys())).toStrictEqual([])
      })

      it("yields every live key exactly once", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
          [keys.four(), bytes.c()],
        ])

        expect(await collectKeys(store.keys())).toStrictEqual(
          [keys.one(), keys.two(), keys.four()].sort(),
        )
      })

      it("filters by prefix", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
          [keys.four(), bytes.c()],
          [keys.five(), bytes.c()],
        ])

        expect(await collectKeys(store.keys("ns:"))).toStrictEqual([keys.one(), keys.two()])
        expect(await collectKeys(store.keys("other:0e"))).toStrictEqual([keys.five()])
        expect(await collectKeys(store.keys("nope:"))).toStrictEqual([])
      })

      it("treats prefix characters literally", async () => {
        await store.setMany([
          ["a*b:1", bytes.a()],
          ["axb:2", bytes.b()],
          ["a?c:3", bytes.c()],
        ])

        expect(await collectKeys(store.keys("a*"))).toStrictEqual(["a*b:1"])
        expect(await collectKeys(store.keys("a?"))).toStrictEqual(["a?c:3"])
      })

      it("does not yield deleted keys", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
        ])
        await store.delete(keys.one())

        expect(await collectKeys(store.keys())).toStrictEqual([keys.two()])
      })

      it("hands back keys containing separators and non-ASCII text unchanged", async () => {
        const odd = ["ns:with/slash", "ns:space and%percent", "ns:日本語:😀"]

        await store.setMany(odd.map((k) => [k, bytes.a()]))

        expect(await collectKeys(store.keys("ns:"))).toStrictEqual([...odd].sort())
      })

      it("stores a key and another key it is a path prefix of", async () => {
        await store.set("a", bytes.a())
        await store.set("a/b", bytes.b())

        expect(await store.get("a")).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await store.get("a/b")).toStrictEqual({ kind: "found", value: bytes.b() })
        expect(await collectKeys(store.keys("a"))).toStrictEqual(["a", "a/b"])
      })

      it("stores keys with leading or repeated separators as distinct keys", async () => {
        const odd = ["/x", "x//y", "x/y", "x"]

        await store.setMany(odd.map((k, i) => [k, new Uint8Array([i])]))

        for (const [i, key] of odd.entries()) {
          expect(await store.get(key)).toStrictEqual({ kind: "found", value: new Uint8Array([i]) })
        }
        expect(await collectKeys(store.keys())).toStrictEqual([...odd].sort())
      })

      it("can be abandoned part way through", async () => {
        await store.setMany([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
          [keys.three(), bytes.c()],
        ])

        const seen: string[] = []
        for await (const key of store.keys()) {
          seen.push(key)
          break
        }

        expect(seen).toHaveLength(1)
        expect(await collectKeys(store.keys())).toHaveLength(3)
      })
    })

    describe("ttl", () => {
      const ttlMs = 80
      const jitterMs = 50
      const ttl = { kind: "milliseconds", milliseconds: ttlMs } as const

      it("keeps an entry readable until its ttl passes", async () => {
        await store.set(keys.one(), bytes.a(), { ttl })

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })

        await sleep(ttlMs + jitterMs)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
        expect(await store.has(keys.one())).toBe(false)
      })

      it("applies the ttl to every entry of setMany", async () => {
        await store.setMany(
          [
            [keys.one(), bytes.a()],
            [keys.two(), bytes.b()],
          ],
          { ttl },
        )

        await sleep(ttlMs + jitterMs)

        const res = await store.getMany([keys.one(), keys.two()])
        expect(res.get(keys.one())).toStrictEqual({ kind: "not_found" })
        expect(res.get(keys.two())).toStrictEqual({ kind: "not_found" })
      })

      it("omits expired entries from keys()", async () => {
        await store.set(keys.one(), bytes.a(), { ttl })
        await store.set(keys.two(), bytes.b())

        await sleep(ttlMs + jitterMs)

        expect(await collectKeys(store.keys())).toStrictEqual([keys.two()])
      })

      it("entries written without a ttl do not expire", async () => {
        await store.set(keys.one(), bytes.a())

        await sleep(ttlMs + jitterMs)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("a rewrite with a new ttl replaces the old one", async () => {
        await store.set(keys.one(), bytes.a(), { ttl: { kind: "milliseconds", milliseconds: 60_000 } })
        await store.set(keys.one(), bytes.b(), { ttl })

        await sleep(ttlMs + jitterMs)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("a rewrite without a ttl keeps the existing one", async () => {
        await store.set(keys.one(), bytes.a(), { ttl })
        await store.set(keys.one(), bytes.b())

        await sleep(ttlMs + jitterMs)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })
    })

    describe("edge cases", () => {
      it("stores values made of zero bytes", async () => {
        const value = new Uint8Array(16)

        await store.set(keys.one(), value)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value })
      })

      it("stores a 1 MiB value", async () => {
        const value = new Uint8Array(1024 * 1024)
        value[0] = 1
        value[value.length - 1] = 2

        await store.set(keys.one(), value)

        const res = await store.get(keys.one())
        expect(res.kind).toBe("found")
        if (res.kind !== "found") return

        expect(res.value.byteLength).toBe(value.byteLength)
        expect(res.value[0]).toBe(1)
        expect(res.value[value.length - 1]).toBe(2)
      })

      it("stores under a long key", async () => {
        const key = `ns:${"f".repeat(2045)}`

        await store.set(key, bytes.a())

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
        expect(await collectKeys(store.keys())).toStrictEqual([key])
      })

      it("handles a hundred entries in one batch", async () => {
        const entries: KvEntry<Uint8Array>[] = Array.from({ length: 100 }, (_, i) => [
          `bulk:${i}`,
          new Uint8Array([i]),
        ])

        await store.setMany(entries)

        const res = await store.getMany(entries.map(([k]) => k))
        expect([...res.values()].every((r) => r.kind === "found")).toBe(true)
        expect(await collectKeys(store.keys("bulk:"))).toHaveLength(100)
      })
    })

    describe("concurrency", () => {
      it("parallel writes to different keys all land", async () => {
        await Promise.all([
          store.set(keys.one(), bytes.a()),
          store.set(keys.two(), bytes.b()),
          store.set(keys.three(), bytes.c()),
        ])

        expect(await collectKeys(store.keys())).toStrictEqual(
          [keys.one(), keys.two(), keys.three()].sort(),
        )
      })

      it("parallel writes to one key leave one of the written values", async () => {
        await Promise.all([store.set(keys.one(), bytes.a()), store.set(keys.one(), bytes.b())])

        const res = await store.get(keys.one())
        expect(res.kind).toBe("found")
        if (res.kind !== "found") return

        expect([bytes.a(), bytes.b()]).toContainEqual(res.value)
      })
    })
  })
}
