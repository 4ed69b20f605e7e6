/**
 * Location Service
 *
 * Validation layer over the LocationRepository. Coordinates are range-checked
 * and immutable; renames and favorite toggles go through `upsertLocation`.
 */

import type { Location, LocationRepository, UpsertLocationInput } from "../../domain/location/Location"
import { assertValidCoordinate } from "../../domain/location/Location"
import { NotFoundError, ValidationError } from "../../shared/errors"

export class LocationService {
  constructor(private locationRepository: LocationRepository) {}

  async listLocations(): Promise<Location[]> {
    const locations = await this.locationRepository.listAll()
    // Favorites first, then alphabetical
    return locations.sort((a, b) => {
      if (a.isFavorite !== b.isFavorite) {
        return a.isFavorite ? -1 : 1
      }
      return a.name.localeCompare(b.name)
    })
  }

  async getLocation(id: string): Promise<Location> {
    const location = await this.locationRepository.findById(id)
    if (!location) {
      throw new NotFoundError("Location")
    }
    return location
  }

  async upsertLocation(input: UpsertLocationInput): Promise<Location> {
    if (!input.id || !input.id.trim()) {
      throw new ValidationError("Location id is required", "id")
    }
    if (/\s/.test(input.id)) {
      throw new ValidationError("Location id must not contain whitespace", "id")
    }
    if (!input.name || !input.name.trim()) {
      throw new ValidationError("Name is required", "name")
    }
    assertValidCoordinate({ latitude: input.latitude, longitude: input.longitude })

    const existing = await this.locationRepository.findById(input.id)
    const now = new Date()

    if (!existing) {
      return this.locationRepository.upsert({
        id: input.id,
        name: input.name.trim(),
        latitude: input.latitude,
        longitude: input.longitude,
        isFavorite: input.isFavorite ?? false,
        createdAt: now,
        updatedAt: now,
      })
    }

    if (existing.latitude !== input.latitude || existing.longitude !== input.longitude) {
      throw new ValidationError(
        `Coordinates of location ${input.id} cannot change; delete and re-create it instead`,
        "latitude"
      )
    }

    return this.locationRepository.upsert({
      ...existing,
      name: input.name.trim(),
      isFavorite: input.isFavorite ?? existing.isFavorite,
      updatedAt: now,
    })
  }

  async deleteLocation(id: string): Promise<void> {
    await this.getLocation(id)
    await this.locationRepository.delete(id)
  }
}
