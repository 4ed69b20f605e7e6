/**
 * Unit and value normalization shared by provider adapters
 */

import type { TemperatureUnit } from "../../shared/types"

const COMPASS_POINTS = [
  "N", "NNE", "NE", "ENE", "E", "ESE", "SE", "SSE",
  "S", "SSW", "SW", "WSW", "W", "WNW", "NW", "NNW",
]

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

/**
 * Convert a temperature reported in `sourceUnit` ("F" or "C") to `unit`,
 * rounded to one decimal when a conversion happens
 */
export function convertTemperature(value: number, sourceUnit: string, unit: TemperatureUnit): number {
  const source = sourceUnit.trim().toUpperCase()
  if (source === "F" && unit === "celsius") {
    return roundTo(((value - 32) * 5) / 9, 1)
  }
  if (source === "C" && unit === "fahrenheit") {
    return roundTo((value * 9) / 5 + 32, 1)
  }
  return value
}

/**
 * 16-point compass direction for a bearing in degrees
 */
export function compassDirection(degrees: number): string {
  const normalized = ((degrees % 360) + 360) % 360
  const index = Math.floor((normalized + 11.25) / 22.5) % 16
  return COMPASS_POINTS[index]
}

export function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)))
}
