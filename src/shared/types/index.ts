/**
 * Shared Types
 */

export type TemperatureUnit = "fahrenheit" | "celsius"

export const TEMPERATURE_UNITS: readonly TemperatureUnit[] = ["fahrenheit", "celsius"]

export interface Coordinate {
  latitude: number
  longitude: number
}

/**
 * Wall clock in epoch milliseconds. Injected so TTL logic can be tested
 * without waiting.
 */
export interface Clock {
  now(): number
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

export interface ApiResponse<T = unknown> {
  data?: T
  error?: string
  code?: string
  message?: string
}
