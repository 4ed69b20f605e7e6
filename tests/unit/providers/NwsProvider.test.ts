/**
 * NwsProvider Unit Tests
 */

import { NwsProvider } from "../../../src/infrastructure/providers/nws/NwsProvider"
import { DecodeError, NetworkError, ProviderError, TimeoutError } from "../../../src/shared/errors"
import { jsonResponse, mockFetchRoutes } from "../../fakes/fetchRoutes"

const BASE = "https://api.weather.gov"
const POINT = "39.78,-89.65"
const COORD = { latitude: 39.78, longitude: -89.65 }
const FORECAST_URL = `${BASE}/gridpoints/ILX/40,50/forecast`
const HOURLY_URL = `${BASE}/gridpoints/ILX/40,50/forecast/hourly`
const ALERTS_URL = `${BASE}/alerts/active?point=${POINT}`

const icon = (path: string) => `${BASE}/icons/land/${path}?size=medium`

const pointPayload = {
  properties: {
    gridId: "ILX",
    gridX: 40,
    gridY: 50,
    forecast: FORECAST_URL,
    forecastHourly: HOURLY_URL,
    timeZone: "America/Chicago",
    relativeLocation: { properties: { city: "Springfield", state: "IL" } },
  },
}

const dailyPayload = {
  properties: {
    updated: "2024-06-01T10:00:00+00:00",
    periods: [
      {
        number: 1,
        name: "Tonight",
        startTime: "2024-06-01T18:00:00-05:00",
        endTime: "2024-06-02T06:00:00-05:00",
        isDaytime: false,
        temperature: 62,
        temperatureUnit: "F",
        windSpeed: "5 mph",
        windDirection: "S",
        icon: icon("night/few"),
        shortForecast: "Mostly Clear",
        detailedForecast: "Mostly clear, with a low around 62.",
        probabilityOfPrecipitation: { value: null },
        relativeHumidity: { value: 80 },
      },
      {
        number: 2,
        name: "Sunday",
        startTime: "2024-06-02T06:00:00-05:00",
        endTime: "2024-06-02T18:00:00-05:00",
        isDaytime: true,
        temperature: 86,
        temperatureUnit: "F",
        windSpeed: "10 to 15 mph",
        windDirection: "SW",
        icon: icon("day/tsra_hi,40"),
        shortForecast: "Chance Showers And Thunderstorms",
        detailedForecast: "A chance of showers and thunderstorms after 1pm. Sunny, with a high near 86.",
        probabilityOfPrecipitation: { value: 40 },
        relativeHumidity: { value: 60 },
      },
      {
        number: 3,
        name: "Sunday Night",
        startTime: "2024-06-02T18:00:00-05:00",
        endTime: "2024-06-03T06:00:00-05:00",
        isDaytime: false,
        temperature: 65,
        temperatureUnit: "F",
        windSpeed: "5 mph",
        windDirection: "W",
        icon: icon("night/rain_showers,60/rain_showers,30"),
        shortForecast: "Showers Likely",
        detailedForecast: "Showers likely. Chance of precipitation is 60%.",
        probabilityOfPrecipitation: { value: null },
        relativeHumidity: { value: 90 },
      },
      {
        number: 4,
        name: "Monday",
        startTime: "2024-06-03T06:00:00-05:00",
        endTime: "2024-06-03T18:00:00-05:00",
        isDaytime: true,
        temperature: 80,
        temperatureUnit: "F",
        windSpeed: "10 mph",
        windDirection: "NW",
        icon: icon("day/sct"),
        shortForecast: "Partly Sunny",
        detailedForecast: "Partly sunny, with a high near 80.",
      },
    ],
  },
}

const hourlyPayload = {
  properties: {
    periods: Array.from({ length: 30 }, (_, i) => ({
      number: i + 1,
      startTime: `2024-06-01T${String(i % 24).padStart(2, "0")}:00:00-05:00`,
      endTime: `2024-06-01T${String(i % 24).padStart(2, "0")}:59:00-05:00`,
      isDaytime: true,
      temperature: 70,
      temperatureUnit: "F",
      windSpeed: "8 mph",
      windDirection: "S",
      icon: icon("day/skc"),
      shortForecast: "Sunny",
      detailedForecast: "",
      probabilityOfPrecipitation: { value: 10 },
      relativeHumidity: { value: 55 },
    })),
  },
}

const alertsPayload = {
  features: [
    {
      properties: {
        id: "urn:oid:test.alert.1",
        event: "Heat Advisory",
        headline: "Heat Advisory issued June 1",
        description: "Heat index values up to 105.",
        severity: "Moderate",
        effective: "2024-06-01T12:00:00-05:00",
        expires: "2024-06-01T20:00:00-05:00",
      },
    },
    {
      properties: {
        id: "urn:oid:test.alert.2",
        event: "Special Weather Statement",
        headline: null,
        description: null,
        severity: "Unknown",
        effective: "2024-06-01T13:00:00-05:00",
        expires: null,
      },
    },
  ],
}

function happyRoutes() {
  return {
    [`${BASE}/points/${POINT}`]: () => jsonResponse(pointPayload),
    [FORECAST_URL]: () => jsonResponse(dailyPayload),
    [HOURLY_URL]: () => jsonResponse(hourlyPayload),
    [ALERTS_URL]: () => jsonResponse(alertsPayload),
  }
}

describe("NwsProvider", () => {
  let provider: NwsProvider
  let fetchSpy: jest.SpyInstance | undefined

  beforeEach(() => {
    provider = new NwsProvider({
      apiBaseUrl: BASE,
      userAgent: "forecast-sync-engine/test",
      requestTimeoutMs: 1000,
    })
  })

  afterEach(() => {
    fetchSpy?.mockRestore()
    fetchSpy = undefined
  })

  it("should expose its provider id", () => {
    expect(provider.id).toBe("nws")
  })

  it("should normalize daily periods into day/night pairs", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    const forecast = await provider.fetch(COORD, "fahrenheit")

    expect(forecast.dailyForecasts).toEqual([
      {
        id: "day-1",
        date: "2024-06-01T18:00:00-05:00",
        tempHigh: null,
        tempLow: 62,
        precipitationChance: 0,
        uvIndex: undefined,
        wind: { speed: 5, direction: "S" },
        icon: "clear-night",
        shortForecast: "Mostly Clear",
        detailedForecast: "Mostly clear, with a low around 62.",
        humidity: 80,
        dewpoint: undefined,
        skyCover: 25,
      },
      {
        id: "day-2",
        date: "2024-06-02T06:00:00-05:00",
        tempHigh: 86,
        tempLow: 65,
        precipitationChance: 60,
        uvIndex: 8,
        wind: { speed: 15, direction: "SW" },
        icon: "thunderstorm",
        shortForecast: "Chance Showers And Thunderstorms",
        detailedForecast: "A chance of showers and thunderstorms after 1pm. Sunny, with a high near 86.",
        humidity: 60,
        dewpoint: undefined,
        skyCover: undefined,
      },
      {
        id: "day-4",
        date: "2024-06-03T06:00:00-05:00",
        tempHigh: 80,
        tempLow: null,
        precipitationChance: 0,
        uvIndex: 5,
        wind: { speed: 10, direction: "NW" },
        icon: "partly-cloudy-day",
        shortForecast: "Partly Sunny",
        detailedForecast: "Partly sunny, with a high near 80.",
        humidity: undefined,
        dewpoint: undefined,
        skyCover: 50,
      },
    ])
  })

  it("should keep the first 24 hourly periods", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    const forecast = await provider.fetch(COORD, "fahrenheit")

    expect(forecast.hourlyForecasts).toHaveLength(24)
    expect(forecast.hourlyForecasts[0]).toEqual({
      id: "hour-1",
      time: "2024-06-01T00:00:00-05:00",
      temperature: 70,
      precipitationChance: 10,
      icon: "clear-day",
      shortForecast: "Sunny",
      wind: { speed: 8, direction: "S" },
      isDaytime: true,
      humidity: 55,
    })
  })

  it("should convert temperatures to Celsius", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    const forecast = await provider.fetch(COORD, "celsius")

    expect(forecast.dailyForecasts.map((day) => [day.tempHigh, day.tempLow])).toEqual([
      [null, 16.7],
      [30, 18.3],
      [26.7, null],
    ])
    expect(forecast.hourlyForecasts[0].temperature).toBe(21.1)
  })

  it("should map alerts and default missing fields", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    const forecast = await provider.fetch(COORD, "fahrenheit")

    expect(forecast.alerts).toEqual([
      {
        id: "urn:oid:test.alert.1",
        headline: "Heat Advisory issued June 1",
        description: "Heat index values up to 105.",
        severity: "moderate",
        event: "Heat Advisory",
        start: "2024-06-01T12:00:00-05:00",
        end: "2024-06-01T20:00:00-05:00",
      },
      {
        id: "urn:oid:test.alert.2",
        headline: "Special Weather Statement",
        description: "",
        severity: "moderate",
        event: "Special Weather Statement",
        start: "2024-06-01T13:00:00-05:00",
        end: null,
      },
    ])
  })

  it("should fill metadata from the grid point", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    const forecast = await provider.fetch(COORD, "fahrenheit")

    expect(forecast.metadata).toEqual({
      providerId: "nws",
      updatedAt: "2024-06-01T10:00:00+00:00",
      providerRef: "ILX/40,50",
      timezone: "America/Chicago",
      locationName: "Springfield, IL",
    })
  })

  it("should send the configured User-Agent", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    await provider.fetch(COORD, "fahrenheit")

    expect(fetchSpy).toHaveBeenCalledWith(
      `${BASE}/points/${POINT}`,
      expect.objectContaining({
        headers: { Accept: "application/json", "User-Agent": "forecast-sync-engine/test" },
      })
    )
  })

  it("should ignore a trailing slash on the base URL", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())
    provider = new NwsProvider({ apiBaseUrl: `${BASE}/` })

    await provider.fetch(COORD, "fahrenheit")

    expect(fetchSpy).toHaveBeenCalledWith(`${BASE}/points/${POINT}`, expect.anything())
  })

  it("should round coordinates to four decimals", async () => {
    fetchSpy = mockFetchRoutes(happyRoutes())

    await provider.fetch({ latitude: 39.780012, longitude: -89.649998 }, "fahrenheit")

    expect(fetchSpy).toHaveBeenCalledWith(`${BASE}/points/${POINT}`, expect.anything())
  })

  it("should return no alerts when the alerts request fails", async () => {
    fetchSpy = mockFetchRoutes({
      ...happyRoutes(),
      [ALERTS_URL]: () => jsonResponse({ detail: "unavailable" }, 503),
    })

    const forecast = await provider.fetch(COORD, "fahrenheit")

    expect(forecast.alerts).toEqual([])
    expect(forecast.dailyForecasts).toHaveLength(3)
    expect(console.warn).toHaveBeenCalledWith(
      `[NWS] Alerts unavailable for ${POINT}: nws alerts: Service unavailable (503)`
    )
  })

  describe("error mapping", () => {
    it("should map a non-2xx status to ProviderError", async () => {
      fetchSpy = mockFetchRoutes({
        [`${BASE}/points/${POINT}`]: () => jsonResponse({ title: "Not Found" }, 404),
      })

      const result = provider.fetch(COORD, "fahrenheit")

      await expect(result).rejects.toThrow(ProviderError)
      await expect(result).rejects.toMatchObject({
        message: "nws points: Location is outside NWS coverage",
        status: 404,
      })
    })

    it("should map a body that is not JSON to DecodeError", async () => {
      fetchSpy = mockFetchRoutes({
        ...happyRoutes(),
        [FORECAST_URL]: () => new Response("<html>oops</html>", { status: 200 }),
      })

      const result = provider.fetch(COORD, "fahrenheit")

      await expect(result).rejects.toThrow(DecodeError)
      await expect(result).rejects.toThrow("nws forecast: response is not valid JSON")
    })

    it("should map an unexpected payload shape to DecodeError", async () => {
      fetchSpy = mockFetchRoutes({
        ...happyRoutes(),
        [HOURLY_URL]: () => jsonResponse({ properties: {} }),
      })

      const result = provider.fetch(COORD, "fahrenheit")

      await expect(result).rejects.toThrow(DecodeError)
      await expect(result).rejects.toThrow("nws hourly forecast: unexpected payload at properties.periods: Required")
    })

    it("should map a transport failure to NetworkError", async () => {
      fetchSpy = jest.spyOn(global, "fetch").mockRejectedValue(new TypeError("fetch failed"))

      const result = provider.fetch(COORD, "fahrenheit")

      await expect(result).rejects.toThrow(NetworkError)
      await expect(result).rejects.toThrow("Request to api.weather.gov failed: fetch failed")
    })

    it("should map an expired request timeout to TimeoutError", async () => {
      provider = new NwsProvider({ apiBaseUrl: BASE, requestTimeoutMs: 20 })
      fetchSpy = jest.spyOn(global, "fetch").mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")))
          })
      )

      const result = provider.fetch(COORD, "fahrenheit")

      await expect(result).rejects.toThrow(TimeoutError)
      await expect(result).rejects.toThrow("Request to api.weather.gov timed out after 20ms")
    })
  })
})
