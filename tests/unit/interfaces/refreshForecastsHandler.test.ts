/**
 * Forecast Refresh Lambda Handler Unit Tests
 */

import type { EventBridgeEvent } from "aws-lambda"
import { createRefreshForecastsHandler } from "../../../src/interfaces/events/refresh-forecasts/refreshForecastsHandler"
import { makeAlert, makeForecast, makeLocation } from "../../fakes/fixtures"
import { createTestEngine } from "../../fakes/testEngine"

const event: EventBridgeEvent<"Scheduled Event", unknown> = {
  id: "event-1",
  version: "0",
  account: "123456789012",
  time: "2024-06-01T12:00:00Z",
  region: "us-east-1",
  resources: [],
  source: "aws.events",
  "detail-type": "Scheduled Event",
  detail: {},
}

const context = { getRemainingTimeInMillis: () => 60_000 }

describe("refreshForecastsHandler", () => {
  it("should refresh every location and surface new alerts", async () => {
    const location = makeLocation()
    const engine = createTestEngine([location])
    const alert = makeAlert({ id: "heat-1" })
    engine.provider.fetch.mockResolvedValue(makeForecast("a", { alerts: [alert] }))

    const report = await createRefreshForecastsHandler(engine)(event, context)

    expect(report.totalLocations).toBe(1)
    expect(report.succeeded).toEqual(["loc-1"])
    expect(report.failed).toEqual([])
    expect(report.alertsSurfaced).toBe(1)
    expect(engine.notifier.notify).toHaveBeenCalledWith(alert, location)
  })

  it("should report failed locations without throwing", async () => {
    const engine = createTestEngine([makeLocation(), makeLocation({ id: "loc-2", name: "Shelbyville", latitude: 39.8 })])
    engine.provider.fetch.mockImplementation(async (coordinate) => {
      if (coordinate.latitude === 39.8) {
        throw new Error("unexpected payload")
      }
      return makeForecast("a")
    })

    const report = await createRefreshForecastsHandler(engine)(event, context)

    expect(report.succeeded).toEqual(["loc-1"])
    expect(report.failed.map(({ locationId, error }) => [locationId, error.message])).toEqual([
      ["loc-2", "unexpected payload"],
    ])
  })

  it("should rethrow when the location list cannot be read", async () => {
    const engine = createTestEngine()
    const failure = new Error("table missing")
    jest.spyOn(engine.locations, "listAll").mockRejectedValue(failure)

    await expect(createRefreshForecastsHandler(engine)(event, context)).rejects.toThrow("table missing")
    expect(console.error).toHaveBeenCalledWith("[RefreshForecasts] Error:", failure)
  })
})
