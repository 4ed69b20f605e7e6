/**
 * Forecast sync engine public API
 */

export { AlertProcessor, filterBySeverity } from "./application/alert/AlertProcessor"
export type { AlertProcessingResult } from "./application/alert/AlertProcessor"
export { CacheStore } from "./application/cache/CacheStore"
export { FetchOrchestrator } from "./application/forecast/FetchOrchestrator"
export type { FetchOrchestratorOptions, ResolveOptions, ResolveOutcome, ResolveState } from "./application/forecast/FetchOrchestrator"
export { LocationService } from "./application/location/LocationService"
export { ProviderSelector, NWS_COVERAGE } from "./application/routing/ProviderSelector"
export type { BoundingBox } from "./application/routing/ProviderSelector"
export { BackgroundRefreshScheduler } from "./application/sync/BackgroundRefreshScheduler"
export type { BackgroundRefreshOptions, RefreshFailure, RefreshReport } from "./application/sync/BackgroundRefreshScheduler"
export * from "./domain/alert/Alert"
export * from "./domain/forecast/Forecast"
export * from "./domain/location/Location"
export { DynamoDBForecastCacheRepository } from "./infrastructure/dynamodb/repositories/ForecastCacheRepository"
export { DynamoDBLocationRepository } from "./infrastructure/dynamodb/repositories/LocationRepository"
export { DynamoDBNotificationOutbox } from "./infrastructure/dynamodb/repositories/NotificationOutbox"
export { DynamoDBSeenAlertRepository } from "./infrastructure/dynamodb/repositories/SeenAlertRepository"
export { NwsProvider } from "./infrastructure/providers/nws/NwsProvider"
export { OpenWeatherMapProvider } from "./infrastructure/providers/openweathermap/OpenWeatherMapProvider"
export { ProviderRegistry } from "./infrastructure/providers/ProviderRegistry"
export { createEngine, createDocumentClient, getEngine } from "./interfaces/bootstrap"
export type { Engine } from "./interfaces/bootstrap"
export { loadConfig } from "./shared/config"
export type { EngineConfig } from "./shared/config"
export * from "./shared/errors"
export * from "./shared/types"
