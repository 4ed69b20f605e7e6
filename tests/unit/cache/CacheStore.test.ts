/**
 * CacheStore Unit Tests
 */

import { CacheStore } from "../../../src/application/cache/CacheStore"
import type { ForecastCacheRepository, Snapshot } from "../../../src/domain/forecast/Forecast"
import { FakeClock } from "../../fakes/FakeClock"
import { InMemoryForecastCacheRepository } from "../../fakes/InMemoryForecastCacheRepository"
import { deferred } from "../../fakes/deferred"
import { makeForecast, makeHourly } from "../../fakes/fixtures"

const HOUR_MS = 60 * 60 * 1000
const KEY = "loc-1:fahrenheit"

function makeSnapshot(tag: string): Snapshot {
  return { locationKey: KEY, ...makeForecast(tag) }
}

describe("CacheStore", () => {
  let clock: FakeClock
  let repository: InMemoryForecastCacheRepository
  let cacheStore: CacheStore

  beforeEach(() => {
    clock = new FakeClock(1_000_000)
    repository = new InMemoryForecastCacheRepository()
    cacheStore = new CacheStore(repository, clock)
  })

  describe("put", () => {
    it("should stamp both expirations from the current time", async () => {
      const entry = await cacheStore.put(KEY, makeSnapshot("a"), 3 * HOUR_MS, HOUR_MS)

      expect(entry.storedAt).toBe(1_000_000)
      expect(entry.dailyExpiresAt).toBe(1_000_000 + 3 * HOUR_MS)
      expect(entry.hourlyExpiresAt).toBe(1_000_000 + HOUR_MS)
      expect(repository.entries.get(KEY)).toEqual(entry)
    })

    it("should resolve only after the backend write completes", async () => {
      const write = deferred<void>()
      const slowRepository: ForecastCacheRepository = {
        load: async () => null,
        save: () => write.promise,
        remove: async () => undefined,
        removeAll: async () => undefined,
      }
      const store = new CacheStore(slowRepository, clock)

      let settled = false
      const put = store.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS).then(() => {
        settled = true
      })

      await Promise.resolve()
      expect(settled).toBe(false)

      write.resolve()
      await put
      expect(settled).toBe(true)
    })
  })

  describe("get", () => {
    it("should return null for an unknown key", async () => {
      expect(await cacheStore.get("missing:fahrenheit")).toBeNull()
    })

    it("should load entries written by a previous process", async () => {
      const entry = {
        snapshot: makeSnapshot("persisted"),
        storedAt: 5,
        dailyExpiresAt: 10,
        hourlyExpiresAt: 8,
      }
      repository.entries.set(KEY, entry)

      expect(await cacheStore.get(KEY)).toEqual(entry)
    })

    it("should return expired entries unchanged", async () => {
      await cacheStore.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS)
      clock.advance(5 * HOUR_MS)

      const entry = await cacheStore.get(KEY)
      expect(entry?.snapshot.dailyForecasts[0].id).toBe("day-a")
    })
  })

  describe("patchHourly", () => {
    it("should replace only hourly data and the hourly expiration", async () => {
      const original = await cacheStore.put(KEY, makeSnapshot("a"), 3 * HOUR_MS, HOUR_MS)
      clock.advance(90 * 60 * 1000)

      const patched = await cacheStore.patchHourly(KEY, [makeHourly(91, "hour-new")], HOUR_MS)

      expect(patched).not.toBeNull()
      expect(patched?.snapshot.hourlyForecasts).toEqual([makeHourly(91, "hour-new")])
      expect(patched?.snapshot.dailyForecasts).toEqual(original.snapshot.dailyForecasts)
      expect(patched?.snapshot.metadata).toEqual(original.snapshot.metadata)
      expect(patched?.storedAt).toBe(original.storedAt)
      expect(patched?.dailyExpiresAt).toBe(original.dailyExpiresAt)
      expect(patched?.hourlyExpiresAt).toBe(1_000_000 + 90 * 60 * 1000 + HOUR_MS)
      expect(repository.entries.get(KEY)).toEqual(patched)
    })

    it("should return null when there is nothing to patch", async () => {
      expect(await cacheStore.patchHourly(KEY, [], HOUR_MS)).toBeNull()
      expect(repository.saves).toBe(0)
    })
  })

  describe("age", () => {
    it("should report time since the entry was stored", async () => {
      await cacheStore.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS)
      clock.advance(42_000)

      expect(await cacheStore.age(KEY)).toBe(42_000)
      expect(await cacheStore.age("other:celsius")).toBeNull()
    })
  })

  describe("clear", () => {
    it("should remove a single key from memory and backend", async () => {
      await cacheStore.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS)
      await cacheStore.put("loc-2:fahrenheit", makeSnapshot("b"), HOUR_MS, HOUR_MS)

      await cacheStore.clear(KEY)

      expect(await cacheStore.get(KEY)).toBeNull()
      expect(await cacheStore.get("loc-2:fahrenheit")).not.toBeNull()
    })

    it("should remove everything on clearAll", async () => {
      await cacheStore.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS)
      await cacheStore.put("loc-2:fahrenheit", makeSnapshot("b"), HOUR_MS, HOUR_MS)

      await cacheStore.clearAll()

      expect(repository.entries.size).toBe(0)
      expect(await cacheStore.get(KEY)).toBeNull()
    })
  })

  it("should serialize concurrent writers", async () => {
    await Promise.all([
      cacheStore.put(KEY, makeSnapshot("a"), HOUR_MS, HOUR_MS),
      cacheStore.put(KEY, makeSnapshot("b"), HOUR_MS, HOUR_MS),
    ])

    const entry = await cacheStore.get(KEY)
    expect(entry?.snapshot.dailyForecasts[0].id).toBe("day-b")
    expect(repository.saves).toBe(2)
  })
})
