/**
 * Cache Store
 *
 * Snapshot cache with independent daily and hourly expirations. Entries are
 * kept in memory and written through to a ForecastCacheRepository; `put`
 * resolves only after the backend write has completed.
 *
 * Every operation runs under one mutex. Entries are small and operations are
 * short, so a single lock is enough.
 */

import type {
  CacheEntry,
  ForecastCacheRepository,
  HourlyForecast,
  Snapshot,
} from "../../domain/forecast/Forecast"
import { Mutex } from "../../shared/concurrency/Mutex"
import { systemClock } from "../../shared/types"
import type { Clock } from "../../shared/types"

export class CacheStore {
  private entries = new Map<string, CacheEntry>()
  private lock = new Mutex()

  constructor(
    private repository: ForecastCacheRepository,
    private clock: Clock = systemClock
  ) {}

  /**
   * Current entry for `key`, expired or not. Expiration is the caller's call.
   */
  async get(key: string): Promise<CacheEntry | null> {
    return this.lock.runExclusive(() => this.read(key))
  }

  async put(key: string, snapshot: Snapshot, dailyTtlMs: number, hourlyTtlMs: number): Promise<CacheEntry> {
    return this.lock.runExclusive(async () => {
      const now = this.clock.now()
      const entry: CacheEntry = {
        snapshot,
        storedAt: now,
        dailyExpiresAt: now + dailyTtlMs,
        hourlyExpiresAt: now + hourlyTtlMs,
      }

      await this.repository.save(key, entry)
      this.entries.set(key, entry)
      return entry
    })
  }

  /**
   * Replace only the hourly forecasts of an existing entry and re-stamp the
   * hourly expiration. Daily data, alerts, metadata and dailyExpiresAt are
   * left as they are. Returns null when there is no entry to patch.
   */
  async patchHourly(key: string, hourlyForecasts: HourlyForecast[], hourlyTtlMs: number): Promise<CacheEntry | null> {
    return this.lock.runExclusive(async () => {
      const existing = await this.read(key)
      if (!existing) {
        return null
      }

      const entry: CacheEntry = {
        ...existing,
        snapshot: { ...existing.snapshot, hourlyForecasts },
        hourlyExpiresAt: this.clock.now() + hourlyTtlMs,
      }

      await this.repository.save(key, entry)
      this.entries.set(key, entry)
      return entry
    })
  }

  /**
   * Milliseconds since the entry was written, or null if there is none
   */
  async age(key: string): Promise<number | null> {
    const entry = await this.get(key)
    return entry ? this.clock.now() - entry.storedAt : null
  }

  async clear(key: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.repository.remove(key)
      this.entries.delete(key)
    })
  }

  async clearAll(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.repository.removeAll()
      this.entries.clear()
    })
  }

  // Caller must hold the lock
  private async read(key: string): Promise<CacheEntry | null> {
    const cached = this.entries.get(key)
    if (cached) {
      return cached
    }

    const loaded = await this.repository.load(key)
    if (loaded) {
      this.entries.set(key, loaded)
    }
    return loaded
  }
}
