/**
 * API Gateway response helpers
 */

import type { APIGatewayProxyResult } from "aws-lambda"
import { AppError, ValidationError } from "../../shared/errors"
import type { ApiResponse } from "../../shared/types"

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }
}

/**
 * AppError keeps its status; anything else is an opaque 500
 */
export function errorResponse(tag: string, error: unknown): APIGatewayProxyResult {
  if (error instanceof AppError) {
    const body: ApiResponse = { error: error.message, code: error.code }
    return jsonResponse(error.statusCode, body)
  }

  console.error(`[${tag}] Error:`, error)
  const body: ApiResponse = { error: "Internal server error" }
  return jsonResponse(500, body)
}

export function parseJsonBody(body: string | null): unknown {
  if (!body) {
    throw new ValidationError("Request body is required")
  }
  try {
    return JSON.parse(body)
  } catch {
    throw new ValidationError("Request body is not valid JSON")
  }
}
