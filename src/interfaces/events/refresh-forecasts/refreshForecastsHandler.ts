/**
 * Forecast Refresh Lambda Handler
 *
 * EventBridge trigger: runs every 15 minutes or more.
 * Refreshes every tracked location and surfaces new alerts. Failed locations
 * are reported in the summary; the next run retries them.
 */

import type { Context, EventBridgeEvent } from "aws-lambda"
import type { RefreshReport } from "../../../application/sync/BackgroundRefreshScheduler"
import { getEngine } from "../../bootstrap"
import type { Engine } from "../../bootstrap"

// Leave room to log the summary before Lambda stops the container
const DEADLINE_MARGIN_MS = 5000

type RefreshEngine = Pick<Engine, "scheduler" | "orchestrator">

export function createRefreshForecastsHandler(engine: RefreshEngine) {
  return async function refreshForecastsHandler(
    event: EventBridgeEvent<"Scheduled Event", unknown>,
    context: Pick<Context, "getRemainingTimeInMillis">
  ): Promise<RefreshReport> {
    console.log("[RefreshForecasts] Event received:", JSON.stringify(event, null, 2))

    const deadline = new Date(Date.now() + context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS)

    try {
      const report = await engine.scheduler.refreshAll(deadline)
      await engine.orchestrator.settle()

      console.log(
        "[RefreshForecasts] Refresh completed:",
        JSON.stringify(
          {
            ...report,
            failed: report.failed.map(({ locationId, error }) => ({ locationId, error: error.message })),
          },
          null,
          2
        )
      )

      return report
    } catch (error: unknown) {
      console.error("[RefreshForecasts] Error:", error)
      throw error
    }
  }
}

export async function handler(
  event: EventBridgeEvent<"Scheduled Event", unknown>,
  context: Context
): Promise<RefreshReport> {
  return createRefreshForecastsHandler(getEngine())(event, context)
}
