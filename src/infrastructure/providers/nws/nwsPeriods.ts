/**
 * NWS forecast period helpers
 *
 * The NWS daily forecast is a list of half-day periods ("Today", "Tonight",
 * "Tuesday", "Tuesday Night", ...). These helpers pair them into days and
 * recover values the basic forecast only carries as text.
 */

import type { IconCode } from "../../../domain/forecast/Forecast"

export interface PeriodLike {
  isDaytime: boolean
}

export interface DayPair<P extends PeriodLike> {
  day?: P
  night?: P
  // The day period when present, otherwise the night
  primary: P
}

/**
 * Pair each daytime period with the night period that directly follows it.
 * A forecast issued in the evening starts with a lone night period and a
 * forecast can end on a lone day period; both become single-sided days.
 */
export function pairDayNightPeriods<P extends PeriodLike>(periods: P[]): DayPair<P>[] {
  const pairs: DayPair<P>[] = []
  let index = 0

  while (index < periods.length) {
    const period = periods[index]

    if (!period.isDaytime) {
      pairs.push({ night: period, primary: period })
      index += 1
      continue
    }

    const following = periods[index + 1]
    if (following && !following.isDaytime) {
      pairs.push({ day: period, night: following, primary: period })
      index += 2
    } else {
      pairs.push({ day: period, primary: period })
      index += 1
    }
  }

  return pairs
}

/**
 * "10 mph" -> 10, "10 to 15 mph" -> 15
 */
export function parseWindSpeed(value: string | null | undefined): number {
  const numbers = (value ?? "").match(/\d+(\.\d+)?/g)
  if (!numbers) {
    return 0
  }
  return Math.max(...numbers.map(Number))
}

const PRECIP_PATTERNS = [
  /chance of precipitation is (\d+)%/i,
  /(\d+)% chance of precipitation/i,
  /(\d+)% chance of rain/i,
  /(\d+)% chance of snow/i,
]

export function extractPrecipChance(detailedForecast: string): number {
  for (const pattern of PRECIP_PATTERNS) {
    const match = pattern.exec(detailedForecast)
    if (match) {
      return Number(match[1])
    }
  }
  return 0
}

export function estimatePrecipChance(shortForecast: string): number {
  if (!/Rain|Showers|Thunderstorms|Snow/.test(shortForecast)) {
    return 0
  }
  if (shortForecast.includes("Slight Chance")) return 20
  if (shortForecast.includes("Chance")) return 40
  if (shortForecast.includes("Likely")) return 70
  if (shortForecast.includes("Definite") || shortForecast.includes("Heavy")) return 90
  return 50
}

export function extractUvIndex(detailedForecast: string): number | undefined {
  const match = /UV index (?:of |around |near )?(\d+)/i.exec(detailedForecast)
  if (match) {
    return Number(match[1])
  }

  const text = detailedForecast.toLowerCase()
  if (text.includes("partly sunny")) return 5
  if (text.includes("sunny")) return 8
  if (text.includes("cloudy")) return 2
  return undefined
}

// Most specific phrases first: "Mostly Clear" also contains "Clear"
const SKY_COVER_PHRASES: Array<[string, number]> = [
  ["Mostly Clear", 25],
  ["Mostly Sunny", 25],
  ["Partly Cloudy", 50],
  ["Partly Sunny", 50],
  ["Mostly Cloudy", 75],
  ["Clear", 0],
  ["Sunny", 0],
  ["Cloudy", 100],
]

export function estimateSkyCover(shortForecast: string): number | undefined {
  const match = SKY_COVER_PHRASES.find(([phrase]) => shortForecast.includes(phrase))
  return match?.[1]
}

const NWS_ICON_CODES: Record<string, "clear" | "partly-cloudy" | Exclude<IconCode, `${string}-day` | `${string}-night`>> = {
  skc: "clear",
  few: "clear",
  hot: "clear",
  cold: "clear",
  sct: "partly-cloudy",
  bkn: "cloudy",
  ovc: "cloudy",
  wind_skc: "wind",
  wind_few: "wind",
  wind_sct: "wind",
  wind_bkn: "wind",
  wind_ovc: "wind",
  rain: "rain",
  rain_showers: "rain",
  rain_showers_hi: "rain",
  tsra: "thunderstorm",
  tsra_sct: "thunderstorm",
  tsra_hi: "thunderstorm",
  tornado: "thunderstorm",
  hurricane: "thunderstorm",
  tropical_storm: "thunderstorm",
  snow: "snow",
  blizzard: "snow",
  rain_snow: "sleet",
  snow_sleet: "sleet",
  sleet: "sleet",
  rain_sleet: "sleet",
  fzra: "sleet",
  rain_fzra: "sleet",
  snow_fzra: "sleet",
  fog: "fog",
  haze: "fog",
  smoke: "fog",
  dust: "fog",
}

/**
 * Map an NWS icon URL (".../icons/land/night/sct,20?size=medium") to an
 * icon code. The first condition in the path wins.
 */
export function mapNwsIcon(iconUrl: string): IconCode {
  let segments: string[]
  try {
    segments = new URL(iconUrl).pathname.split("/").filter(Boolean)
  } catch {
    return "cloudy"
  }

  const timeIndex = segments.findIndex((segment) => segment === "day" || segment === "night")
  if (timeIndex === -1 || timeIndex + 1 >= segments.length) {
    return "cloudy"
  }

  const isNight = segments[timeIndex] === "night"
  const code = segments[timeIndex + 1].split(",")[0]
  const mapped = NWS_ICON_CODES[code] ?? "cloudy"

  if (mapped === "clear") {
    return isNight ? "clear-night" : "clear-day"
  }
  if (mapped === "partly-cloudy") {
    return isNight ? "partly-cloudy-night" : "partly-cloudy-day"
  }
  return mapped
}
