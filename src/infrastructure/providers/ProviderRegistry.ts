/**
 * Provider Registry
 *
 * Builds one adapter per configured provider and hands them out by id.
 */

import type {
  ForecastProvider,
  ForecastProviderRegistry,
  ProviderId,
} from "../../domain/forecast/Forecast"
import type { EngineConfig } from "../../shared/config"
import { ConfigurationError } from "../../shared/errors"
import { NwsProvider } from "./nws/NwsProvider"
import { OpenWeatherMapProvider } from "./openweathermap/OpenWeatherMapProvider"

export class ProviderRegistry implements ForecastProviderRegistry {
  private providers = new Map<ProviderId, ForecastProvider>()

  constructor(providers: ForecastProvider[]) {
    for (const provider of providers) {
      this.providers.set(provider.id, provider)
    }
  }

  static fromConfig(config: EngineConfig["providers"]): ProviderRegistry {
    return new ProviderRegistry([
      new NwsProvider({
        apiBaseUrl: config.nws.apiBaseUrl,
        userAgent: config.nws.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
      new OpenWeatherMapProvider({
        apiBaseUrl: config.openWeatherMap.apiBaseUrl,
        apiKey: config.openWeatherMap.apiKey,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
    ])
  }

  get(id: ProviderId): ForecastProvider {
    const provider = this.providers.get(id)
    if (!provider) {
      throw new ConfigurationError(`Unsupported forecast provider: ${id}`)
    }
    return provider
  }
}
