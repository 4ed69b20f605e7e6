/**
 * Base Forecast Provider
 *
 * Abstract base class for all forecast provider adapters.
 * Each provider extends this class and implements `fetch`, normalizing its
 * payload into the shared Snapshot shape. The base class owns the HTTP
 * plumbing: base URL resolution, headers, timeouts, status and payload
 * checks.
 */

import type { z } from "zod"
import type {
  ForecastProvider,
  ProviderForecast,
  ProviderId,
} from "../../../domain/forecast/Forecast"
import {
  DecodeError,
  NetworkError,
  ProviderError,
  errorMessage,
} from "../../../shared/errors"
import type { Coordinate, TemperatureUnit } from "../../../shared/types"
import { DEFAULT_REQUEST_TIMEOUT_MS, fetchWithTimeout } from "../httpClient"
import type { ProviderConfig } from "../types"

export abstract class BaseForecastProvider implements ForecastProvider {
  protected config: ProviderConfig

  constructor(config: ProviderConfig) {
    this.config = config
  }

  get id(): ProviderId {
    return this.config.id
  }

  /**
   * Fetch and normalize the full forecast for a coordinate
   */
  abstract fetch(coordinate: Coordinate, unit: TemperatureUnit): Promise<ProviderForecast>

  protected getApiBaseUrl(): string {
    return this.config.apiBaseUrl.replace(/\/+$/, "")
  }

  protected getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" }
    if (this.config.userAgent) {
      headers["User-Agent"] = this.config.userAgent
    }
    return headers
  }

  /**
   * Message for a non-2xx response. Providers override for known statuses.
   */
  protected describeStatus(status: number): string {
    return `Server error: ${status}`
  }

  /**
   * GET a JSON document and validate it against `schema`
   */
  protected async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string
  ): Promise<T> {
    const response = await fetchWithTimeout(
      url,
      { headers: this.getHeaders() },
      this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    )

    if (!response.ok) {
      throw new ProviderError(`${this.id} ${label}: ${this.describeStatus(response.status)}`, response.status)
    }

    let text: string
    try {
      text = await response.text()
    } catch (error: unknown) {
      throw new NetworkError(`${this.id} ${label}: failed to read response body: ${errorMessage(error)}`, error)
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error: unknown) {
      throw new DecodeError(`${this.id} ${label}: response is not valid JSON`, error)
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue?.path.join(".") || "(root)"
      throw new DecodeError(`${this.id} ${label}: unexpected payload at ${where}: ${issue?.message ?? "invalid"}`, parsed.error)
    }

    return parsed.data
  }
}
