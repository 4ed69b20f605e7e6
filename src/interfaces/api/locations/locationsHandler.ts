/**
 * Locations API Handler
 *
 * GET    /api/locations
 * PUT    /api/locations/{locationId}
 * DELETE /api/locations/{locationId}
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { z } from "zod"
import { buildLocationKey } from "../../../domain/location/Location"
import { ValidationError } from "../../../shared/errors"
import { TEMPERATURE_UNITS } from "../../../shared/types"
import { getEngine } from "../../bootstrap"
import type { Engine } from "../../bootstrap"
import { errorResponse, jsonResponse, parseJsonBody } from "../http"
import { requirePathParameter } from "../params"
import type { ApiRequest } from "../params"

const upsertBodySchema = z.object({
  name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  isFavorite: z.boolean().optional(),
})

type LocationsEngine = Pick<Engine, "cacheStore" | "locationService">

export function createLocationsHandlers(engine: LocationsEngine) {
  async function listLocationsHandler(): Promise<APIGatewayProxyResult> {
    try {
      const locations = await engine.locationService.listLocations()
      return jsonResponse(200, { locations })
    } catch (error: unknown) {
      return errorResponse("Locations", error)
    }
  }

  async function upsertLocationHandler(event: ApiRequest): Promise<APIGatewayProxyResult> {
    try {
      const id = requirePathParameter(event, "locationId")
      const parsed = upsertBodySchema.safeParse(parseJsonBody(event.body))
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        throw new ValidationError(`Invalid location: ${issue.path.join(".")} ${issue.message}`, issue.path.join("."))
      }

      const location = await engine.locationService.upsertLocation({ id, ...parsed.data })
      return jsonResponse(200, { location })
    } catch (error: unknown) {
      return errorResponse("Locations", error)
    }
  }

  async function deleteLocationHandler(event: ApiRequest): Promise<APIGatewayProxyResult> {
    try {
      const id = requirePathParameter(event, "locationId")
      await engine.locationService.deleteLocation(id)
      await Promise.all(
        TEMPERATURE_UNITS.map((unit) => engine.cacheStore.clear(buildLocationKey(id, unit)))
      )
      return jsonResponse(200, { deleted: id })
    } catch (error: unknown) {
      return errorResponse("Locations", error)
    }
  }

  return { listLocationsHandler, upsertLocationHandler, deleteLocationHandler }
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const handlers = createLocationsHandlers(getEngine())

  switch (event.httpMethod) {
    case "GET":
      return handlers.listLocationsHandler()
    case "PUT":
      return handlers.upsertLocationHandler(event)
    case "DELETE":
      return handlers.deleteLocationHandler(event)
    default:
      return jsonResponse(405, { error: "Method not allowed" })
  }
}
