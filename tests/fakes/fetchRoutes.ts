/**
 * Route-table stand-in for global fetch
 */

export type Route = (init?: RequestInit) => Response | Promise<Response>

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

export function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input
  }
  return input instanceof URL ? input.href : input.url
}

export function mockFetchRoutes(routes: Record<string, Route>): jest.SpyInstance {
  return jest.spyOn(global, "fetch").mockImplementation(async (input, init) => {
    const url = urlOf(input)
    const route = routes[url]
    if (!route) {
      throw new Error(`Unexpected request: ${url}`)
    }
    return route(init)
  })
}
