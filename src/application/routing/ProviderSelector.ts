/**
 * Provider Selector
 *
 * Routes a coordinate to the forecast provider that covers it. The National
 * Weather Service is free and higher resolution but only covers the US, so
 * anything inside its bounding boxes goes there and everything else goes to
 * OpenWeatherMap.
 *
 * Boxes are approximate. An authoritative reverse-geocode check would be more
 * accurate near borders but costs a network round trip per decision.
 */

import type { ProviderId } from "../../domain/forecast/Forecast"
import type { Coordinate } from "../../shared/types"

export interface BoundingBox {
  name: string
  minLat: number
  maxLat: number
  minLon: number
  maxLon: number
}

export const NWS_COVERAGE: readonly BoundingBox[] = [
  { name: "continental-us", minLat: 24.396308, maxLat: 49.384358, minLon: -125.0, maxLon: -66.93457 },
  { name: "alaska", minLat: 51.0, maxLat: 71.5, minLon: -180.0, maxLon: -129.0 },
  { name: "hawaii", minLat: 18.0, maxLat: 23.0, minLon: -160.0, maxLon: -154.0 },
]

function contains(box: BoundingBox, { latitude, longitude }: Coordinate): boolean {
  return (
    latitude >= box.minLat &&
    latitude <= box.maxLat &&
    longitude >= box.minLon &&
    longitude <= box.maxLon
  )
}

export class ProviderSelector {
  constructor(
    private coverage: readonly BoundingBox[] = NWS_COVERAGE,
    private regionalProvider: ProviderId = "nws",
    private globalProvider: ProviderId = "openweathermap"
  ) {}

  select(coordinate: Coordinate): ProviderId {
    return this.coverage.some((box) => contains(box, coordinate))
      ? this.regionalProvider
      : this.globalProvider
  }
}
