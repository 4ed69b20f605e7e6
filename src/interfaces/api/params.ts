/**
 * Query and path parameter parsing shared by the API handlers
 */

import type { APIGatewayProxyEvent } from "aws-lambda"
import type { AlertSeverity } from "../../domain/alert/Alert"
import { ALERT_SEVERITIES } from "../../domain/alert/Alert"
import { ValidationError } from "../../shared/errors"
import { TEMPERATURE_UNITS } from "../../shared/types"
import type { TemperatureUnit } from "../../shared/types"

export type ApiRequest = Pick<
  APIGatewayProxyEvent,
  "httpMethod" | "pathParameters" | "queryStringParameters" | "body"
>

export function requirePathParameter(event: ApiRequest, name: string): string {
  const value = event.pathParameters?.[name]
  if (!value) {
    throw new ValidationError(`Missing path parameter: ${name}`, name)
  }
  return decodeURIComponent(value)
}

export function parseUnit(value: string | undefined, fallback: TemperatureUnit): TemperatureUnit {
  if (!value) {
    return fallback
  }
  const unit = TEMPERATURE_UNITS.find((candidate) => candidate === value.toLowerCase())
  if (!unit) {
    throw new ValidationError(`Invalid unit: ${value}`, "unit")
  }
  return unit
}

export function parseSeverity(value: string | undefined): AlertSeverity {
  if (!value) {
    return "minor"
  }
  const severity = ALERT_SEVERITIES.find((candidate) => candidate === value.toLowerCase())
  if (!severity) {
    throw new ValidationError(`Invalid severity: ${value}`, "minSeverity")
  }
  return severity
}
