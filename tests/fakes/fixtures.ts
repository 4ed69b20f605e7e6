/**
 * Builders for test data
 */

import type { Alert } from "../../src/domain/alert/Alert"
import type { HourlyForecast, ProviderForecast } from "../../src/domain/forecast/Forecast"
import type { Location } from "../../src/domain/location/Location"

export function makeLocation(overrides: Partial<Location> = {}): Location {
  return {
    id: "loc-1",
    name: "Springfield",
    latitude: 39.78,
    longitude: -89.65,
    isFavorite: false,
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    updatedAt: new Date("2024-01-01T00:00:00.000Z"),
    ...overrides,
  }
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: "alert-1",
    headline: "Heat Advisory issued",
    description: "Hot conditions expected",
    severity: "moderate",
    event: "Heat Advisory",
    start: "2024-06-01T12:00:00.000Z",
    end: "2024-06-01T20:00:00.000Z",
    ...overrides,
  }
}

export function makeHourly(temperature: number, id: string = "hour-1"): HourlyForecast {
  return {
    id,
    time: "2024-06-01T13:00:00.000Z",
    temperature,
    precipitationChance: 10,
    icon: "clear-day",
    shortForecast: "Sunny",
    wind: { speed: 5, direction: "S" },
    isDaytime: true,
  }
}

export function makeForecast(tag: string, overrides: Partial<ProviderForecast> = {}): ProviderForecast {
  return {
    dailyForecasts: [
      {
        id: `day-${tag}`,
        date: "2024-06-01T06:00:00.000Z",
        tempHigh: 80,
        tempLow: 60,
        precipitationChance: 20,
        wind: { speed: 10, direction: "SW" },
        icon: "partly-cloudy-day",
        shortForecast: `Forecast ${tag}`,
      },
    ],
    hourlyForecasts: [makeHourly(75, `hour-${tag}`)],
    alerts: [],
    metadata: {
      providerId: "nws",
      updatedAt: "2024-06-01T11:00:00.000Z",
      providerRef: "LSX/1,2",
    },
    ...overrides,
  }
}
