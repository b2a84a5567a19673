// 设置 NWS（美国国家气象局）API 基础信息
export const NWS_API_BASE = "https://api.weather.gov"
export const USER_AGENT = "weather-app/1.0"
export const REQUEST_TIMEOUT_MS = 30_000

export type JsonObject = { [key: string]: unknown }

export type FetchFailureReason = "network" | "timeout" | "status" | "parse"

// 请求结果：成功时带 JSON 对象，失败时只带原因，不向工具层暴露细节
export type FetchResult = { ok: true; data: JsonObject } | { ok: false; reason: FetchFailureReason }

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export type NWSRequest = (url: string) => Promise<FetchResult>

export interface NWSRequestOptions {
  userAgent?: string
  timeoutMs?: number
  fetch?: FetchLike
  logger?: Pick<Console, "error">
}

class MalformedBodyError extends Error {
  override readonly name = "MalformedBodyError"
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// 只识别传输和解析类错误，其余视为程序错误继续抛出
function classifyFailure(error: unknown): FetchFailureReason | undefined {
  if (!(error instanceof Error)) return undefined
  if (error.name === "TimeoutError" || error.name === "AbortError") return "timeout"
  if (error instanceof SyntaxError || error instanceof MalformedBodyError) return "parse"
  if (error instanceof TypeError) return "network"
  return undefined
}

// 通用请求封装：调用 NWS API 接口并解析 JSON 返回
export function createNWSRequest(options: NWSRequestOptions = {}): NWSRequest {
  const {
    userAgent = USER_AGENT,
    timeoutMs = REQUEST_TIMEOUT_MS,
    fetch: fetchImpl = fetch,
    logger = console,
  } = options

  const headers = {
    "User-Agent": userAgent,
    Accept: "application/geo+json",
  }

  return async function makeNWSRequest(url: string): Promise<FetchResult> {
    try {
      // 每次请求单独创建超时信号，互不影响
      const response = await fetchImpl(url, { headers, signal: AbortSignal.timeout(timeoutMs) })
      if (!response.ok) {
        logger.error("错误请求美国国家气象局:", url, `HTTP 错误状态码: ${response.status}`)
        // 丢弃响应体，释放连接
        await response.body?.cancel()
        return { ok: false, reason: "status" }
      }

      const body: unknown = await response.json()
      if (!isJsonObject(body)) throw new MalformedBodyError("响应体不是 JSON 对象")
      return { ok: true, data: body }
    } catch (error) {
      const reason = classifyFailure(error)
      if (!reason) throw error
      logger.error("错误请求美国国家气象局:", url, error)
      return { ok: false, reason }
    }
  }
}
