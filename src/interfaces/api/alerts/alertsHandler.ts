/**
 * Alerts API Handler
 *
 * GET    /api/alerts/{locationId}?minSeverity=&unit=  - active alerts at or above a severity
 * DELETE /api/alerts/seen                             - forget which alerts were notified
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { buildLocationKey, coordinateOf } from "../../../domain/location/Location"
import { getEngine } from "../../bootstrap"
import type { Engine } from "../../bootstrap"
import { errorResponse, jsonResponse } from "../http"
import { parseSeverity, parseUnit, requirePathParameter } from "../params"
import type { ApiRequest } from "../params"

type AlertsEngine = Pick<Engine, "config" | "orchestrator" | "alertProcessor" | "locationService">

export function createAlertsHandlers(engine: AlertsEngine) {
  async function getAlertsHandler(event: ApiRequest): Promise<APIGatewayProxyResult> {
    try {
      const locationId = requirePathParameter(event, "locationId")
      const minSeverity = parseSeverity(event.queryStringParameters?.minSeverity)
      const unit = parseUnit(event.queryStringParameters?.unit, engine.config.defaultUnit)

      const location = await engine.locationService.getLocation(locationId)
      const key = buildLocationKey(location.id, unit)
      const snapshot = await engine.orchestrator.resolve(key, coordinateOf(location), unit)
      await engine.orchestrator.settle(key)

      return jsonResponse(200, {
        alerts: engine.alertProcessor.filter(snapshot.alerts, minSeverity),
      })
    } catch (error: unknown) {
      return errorResponse("Alerts", error)
    }
  }

  async function resetSeenAlertsHandler(): Promise<APIGatewayProxyResult> {
    try {
      await engine.alertProcessor.reset()
      console.log("[Alerts] Seen alert history cleared")
      return jsonResponse(200, { reset: true })
    } catch (error: unknown) {
      return errorResponse("Alerts", error)
    }
  }

  return { getAlertsHandler, resetSeenAlertsHandler }
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const handlers = createAlertsHandlers(getEngine())

  switch (event.httpMethod) {
    case "GET":
      return handlers.getAlertsHandler(event)
    case "DELETE":
      return handlers.resetSeenAlertsHandler()
    default:
      return jsonResponse(405, { error: "Method not allowed" })
  }
}
