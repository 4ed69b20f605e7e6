/**
 * Location Domain Entity
 *
 * A place the user tracks. Coordinates are fixed once the location exists;
 * moving a pin means deleting and creating a new location.
 */

import type { Coordinate, TemperatureUnit } from "../../shared/types"
import { ValidationError } from "../../shared/errors"

export interface Location {
  id: string
  name: string
  latitude: number
  longitude: number
  isFavorite: boolean
  createdAt: Date
  updatedAt: Date
}

export interface UpsertLocationInput {
  id: string
  name: string
  latitude: number
  longitude: number
  isFavorite?: boolean
}

export interface LocationRepository {
  listAll(): Promise<Location[]>
  findById(id: string): Promise<Location | null>
  upsert(location: Location): Promise<Location>
  delete(id: string): Promise<void>
}

export function coordinateOf(location: Pick<Location, "latitude" | "longitude">): Coordinate {
  return { latitude: location.latitude, longitude: location.longitude }
}

/**
 * Cache key for a location's snapshot. Providers return unit-specific values,
 * so each unit is cached separately.
 */
export function buildLocationKey(locationId: string, unit: TemperatureUnit): string {
  return `${locationId}:${unit}`
}

export function assertValidCoordinate(coordinate: Coordinate): void {
  const { latitude, longitude } = coordinate
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError(`Invalid latitude: ${latitude}`, "latitude")
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError(`Invalid longitude: ${longitude}`, "longitude")
  }
}

export function assertValidLocationKey(key: string): void {
  if (!key || /\s/.test(key)) {
    throw new ValidationError(`Invalid location key: "${key}"`, "locationKey")
  }
}
