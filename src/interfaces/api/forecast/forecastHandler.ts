/**
 * Forecast API Handler
 *
 * GET    /api/forecast/{locationId}?unit=  - cached or freshly fetched snapshot
 * DELETE /api/forecast/{locationId}        - drop cached snapshots (both units)
 * DELETE /api/forecast                     - drop every cached snapshot
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { buildLocationKey, coordinateOf } from "../../../domain/location/Location"
import { TEMPERATURE_UNITS } from "../../../shared/types"
import { getEngine } from "../../bootstrap"
import type { Engine } from "../../bootstrap"
import { errorResponse, jsonResponse } from "../http"
import { parseUnit, requirePathParameter } from "../params"
import type { ApiRequest } from "../params"

type ForecastEngine = Pick<Engine, "config" | "cacheStore" | "orchestrator" | "locationService">

export function createForecastHandlers(engine: ForecastEngine) {
  /**
   * GET /api/forecast/{locationId}
   */
  async function getForecastHandler(event: ApiRequest): Promise<APIGatewayProxyResult> {
    try {
      const locationId = requirePathParameter(event, "locationId")
      const unit = parseUnit(event.queryStringParameters?.unit, engine.config.defaultUnit)

      const location = await engine.locationService.getLocation(locationId)
      const key = buildLocationKey(location.id, unit)
      const outcome = await engine.orchestrator.resolveWithState(key, coordinateOf(location), unit)
      // Finish any hourly patch before the invocation ends
      await engine.orchestrator.settle(key)

      return jsonResponse(200, {
        forecast: outcome.snapshot,
        state: outcome.state,
        stale: outcome.state === "stale-fallback",
      })
    } catch (error: unknown) {
      return errorResponse("Forecast", error)
    }
  }

  /**
   * DELETE /api/forecast[/{locationId}]
   */
  async function clearForecastHandler(event: ApiRequest): Promise<APIGatewayProxyResult> {
    try {
      const locationId = event.pathParameters?.locationId
      if (!locationId) {
        await engine.cacheStore.clearAll()
        console.log("[Forecast] Cleared all cached forecasts")
        return jsonResponse(200, { cleared: "all" })
      }

      const id = decodeURIComponent(locationId)
      await Promise.all(
        TEMPERATURE_UNITS.map((unit) => engine.cacheStore.clear(buildLocationKey(id, unit)))
      )
      console.log(`[Forecast] Cleared cached forecasts for ${id}`)
      return jsonResponse(200, { cleared: id })
    } catch (error: unknown) {
      return errorResponse("Forecast", error)
    }
  }

  return { getForecastHandler, clearForecastHandler }
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const { getForecastHandler, clearForecastHandler } = createForecastHandlers(getEngine())

  switch (event.httpMethod) {
    case "GET":
      return getForecastHandler(event)
    case "DELETE":
      return clearForecastHandler(event)
    default:
      return jsonResponse(405, { error: "Method not allowed" })
  }
}
