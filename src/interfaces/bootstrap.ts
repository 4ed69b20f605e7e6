/**
 * Engine wiring shared by the Lambda handlers
 *
 * Objects are built once per container and reused across invocations, so the
 * cache, the single-flight map and the alert history live as long as the
 * container does.
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { AlertProcessor } from "../application/alert/AlertProcessor"
import { CacheStore } from "../application/cache/CacheStore"
import { FetchOrchestrator } from "../application/forecast/FetchOrchestrator"
import { LocationService } from "../application/location/LocationService"
import { ProviderSelector } from "../application/routing/ProviderSelector"
import { BackgroundRefreshScheduler } from "../application/sync/BackgroundRefreshScheduler"
import { DynamoDBForecastCacheRepository } from "../infrastructure/dynamodb/repositories/ForecastCacheRepository"
import { DynamoDBLocationRepository } from "../infrastructure/dynamodb/repositories/LocationRepository"
import { DynamoDBNotificationOutbox } from "../infrastructure/dynamodb/repositories/NotificationOutbox"
import { DynamoDBSeenAlertRepository } from "../infrastructure/dynamodb/repositories/SeenAlertRepository"
import { ProviderRegistry } from "../infrastructure/providers/ProviderRegistry"
import { loadConfig } from "../shared/config"
import type { EngineConfig } from "../shared/config"

export interface Engine {
  config: EngineConfig
  cacheStore: CacheStore
  orchestrator: FetchOrchestrator
  alertProcessor: AlertProcessor
  locationService: LocationService
  scheduler: BackgroundRefreshScheduler
}

export function createDocumentClient(): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({}), {
    marshallOptions: { removeUndefinedValues: true },
  })
}

export function createEngine(config: EngineConfig, dynamoClient: DynamoDBDocumentClient): Engine {
  const locationRepository = new DynamoDBLocationRepository(dynamoClient, config.tables.locations)
  const cacheStore = new CacheStore(
    new DynamoDBForecastCacheRepository(dynamoClient, config.tables.forecastCache)
  )

  const orchestrator = new FetchOrchestrator(
    cacheStore,
    new ProviderSelector(),
    ProviderRegistry.fromConfig(config.providers),
    {
      dailyTtlMs: config.cache.dailyTtlMs,
      hourlyTtlMs: config.cache.hourlyTtlMs,
    }
  )

  const alertProcessor = new AlertProcessor(
    new DynamoDBSeenAlertRepository(dynamoClient, config.tables.seenAlerts),
    new DynamoDBNotificationOutbox(dynamoClient, config.tables.notifications)
  )

  const scheduler = new BackgroundRefreshScheduler(locationRepository, orchestrator, {
    concurrency: config.refresh.concurrency,
    locationTimeoutMs: config.refresh.locationTimeoutMs,
    unit: config.defaultUnit,
    alertProcessor,
  })

  return {
    config,
    cacheStore,
    orchestrator,
    alertProcessor,
    locationService: new LocationService(locationRepository),
    scheduler,
  }
}

let engine: Engine | undefined

/**
 * Container-wide engine, created on first use
 */
export function getEngine(): Engine {
  if (!engine) {
    engine = createEngine(loadConfig(), createDocumentClient())
  }
  return engine
}
