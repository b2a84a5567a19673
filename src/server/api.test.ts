import { describe, expect, it, vi } from "vitest"
import { createNWSRequest, type FetchLike } from "./api"

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/geo+json" } })
}

function setup(impl: FetchLike) {
  const fetch = vi.fn(impl)
  const logger = { error: vi.fn() }
  const request = createNWSRequest({ fetch, logger, userAgent: "test-agent/0.1", timeoutMs: 1_000 })
  return { fetch, logger, request }
}

describe("createNWSRequest", () => {
  it("returns the parsed JSON object on success", async () => {
    const { request } = setup(async () => jsonResponse({ features: [] }))

    await expect(request("https://nws.test/alerts/active/area/CA")).resolves.toEqual({
      ok: true,
      data: { features: [] },
    })
  })

  it("sends the user agent, geo+json accept header and a timeout signal", async () => {
    const { fetch, request } = setup(async () => jsonResponse({}))

    await request("https://nws.test/points/1,2")

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch).toHaveBeenCalledWith("https://nws.test/points/1,2", {
      headers: { "User-Agent": "test-agent/0.1", Accept: "application/geo+json" },
      signal: expect.any(AbortSignal),
    })
  })

  it("reports a non-2xx status as a failure", async () => {
    const { request, logger } = setup(async () => jsonResponse({ title: "Not Found" }, 404))

    await expect(request("https://nws.test/alerts/active/area/ZZ")).resolves.toEqual({ ok: false, reason: "status" })
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it("releases the body of a non-2xx response", async () => {
    const response = new Response("upstream error", { status: 500 })
    const { request } = setup(async () => response)

    await expect(request("https://nws.test/points/1,2")).resolves.toEqual({ ok: false, reason: "status" })
    expect(response.bodyUsed).toBe(true)
  })

  it("reports a network error as a failure", async () => {
    const { request } = setup(async () => {
      throw new TypeError("fetch failed")
    })

    await expect(request("https://nws.test/points/1,2")).resolves.toEqual({ ok: false, reason: "network" })
  })

  it("reports a malformed body as a failure", async () => {
    const { request } = setup(async () => new Response("<html>oops</html>", { status: 200 }))

    await expect(request("https://nws.test/points/1,2")).resolves.toEqual({ ok: false, reason: "parse" })
  })

  it("reports a JSON body that is not an object as a failure", async () => {
    const { request } = setup(async () => jsonResponse([1, 2, 3]))

    await expect(request("https://nws.test/points/1,2")).resolves.toEqual({ ok: false, reason: "parse" })
  })

  it("reports a timeout as a failure", async () => {
    const fetch = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(init.signal?.reason))
        }),
    )
    const request = createNWSRequest({ fetch, logger: { error: vi.fn() }, timeoutMs: 10 })

    await expect(request("https://nws.test/points/1,2")).resolves.toEqual({ ok: false, reason: "timeout" })
  })

  it("lets errors outside the transport categories propagate", async () => {
    const { request } = setup(async () => {
      throw new RangeError("bug")
    })

    await expect(request("https://nws.test/points/1,2")).rejects.toThrow(RangeError)
  })

  it("keeps no state between calls", async () => {
    const { request } = setup(async () => jsonResponse({ features: [{ id: "a" }] }))

    const first = await request("https://nws.test/alerts/active/area/CA")
    const second = await request("https://nws.test/alerts/active/area/CA")
    expect(second).toEqual(first)
  })
})
