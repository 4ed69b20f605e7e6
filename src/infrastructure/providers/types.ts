/**
 * Provider Adapter Types
 */

import type { ProviderId } from "../../domain/forecast/Forecast"

export interface ProviderConfig {
  id: ProviderId
  apiBaseUrl: string
  apiKey?: string
  userAgent?: string
  requestTimeoutMs?: number
}
