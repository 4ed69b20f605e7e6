/**
 * Alert Domain Entity
 *
 * A transient hazard notice issued by a forecast provider. `id` is stable
 * across refreshes and is the only deduplication key.
 */

import type { Location } from "../location/Location"

export type AlertSeverity = "minor" | "moderate" | "severe" | "extreme"

export const ALERT_SEVERITIES: readonly AlertSeverity[] = ["minor", "moderate", "severe", "extreme"]

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  minor: 0,
  moderate: 1,
  severe: 2,
  extreme: 3,
}

export interface Alert {
  id: string
  headline: string
  description: string
  severity: AlertSeverity
  event: string
  start: string
  end: string | null
}

export interface AlertNotificationClass {
  category: "ALERT_MINOR" | "ALERT_MODERATE" | "ALERT_SEVERE" | "ALERT_EXTREME"
  critical: boolean
}

/**
 * Normalize a provider or persisted severity value.
 * Anything unrecognized is treated as moderate.
 */
export function classifySeverity(value: unknown): AlertSeverity {
  if (typeof value !== "string") {
    return "moderate"
  }
  const normalized = value.trim().toLowerCase()
  return ALERT_SEVERITIES.find((severity) => severity === normalized) ?? "moderate"
}

export function compareSeverity(a: AlertSeverity, b: AlertSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b]
}

export function isAtLeast(severity: AlertSeverity, minimum: AlertSeverity): boolean {
  return compareSeverity(severity, minimum) >= 0
}

export function notificationClassFor(severity: AlertSeverity): AlertNotificationClass {
  switch (severity) {
    case "minor":
      return { category: "ALERT_MINOR", critical: false }
    case "moderate":
      return { category: "ALERT_MODERATE", critical: false }
    case "severe":
      return { category: "ALERT_SEVERE", critical: true }
    case "extreme":
      return { category: "ALERT_EXTREME", critical: true }
  }
}

/**
 * Durable record of alert ids already handed to the Notifier
 */
export interface SeenAlertRepository {
  /** Returns the subset of `ids` that has never been marked seen */
  filterUnseen(ids: string[]): Promise<string[]>
  markSeen(ids: string[]): Promise<void>
  reset(): Promise<void>
}

export interface Notifier {
  notify(alert: Alert, location: Location): Promise<void>
}
