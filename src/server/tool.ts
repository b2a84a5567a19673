import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod" // 用于参数校验的库
import { UpstreamShapeError } from "./errors"
import type { WeatherHandlers } from "./weather"

export const SERVER_NAME = "weather"
export const SERVER_VERSION = "1.0.0"

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] }
}

// 上游数据结构异常时返回 isError 结果，不让进程崩溃；其它错误交给 SDK 处理
async function runTool(action: () => Promise<string>): Promise<CallToolResult> {
  try {
    return textResult(await action())
  } catch (error) {
    if (!(error instanceof UpstreamShapeError)) throw error
    console.error("上游返回数据结构异常:", error.message)
    return { ...textResult(error.message), isError: true }
  }
}

// 创建 MCP 服务器实例并注册两个天气工具
export function createWeatherServer(handlers: WeatherHandlers): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

  // 工具 1️⃣：根据州代码获取当前生效的天气警报
  server.tool(
    "get_alerts",
    "Get weather alerts for a US state",
    {
      state: z.string().describe("Two-letter US state code (e.g. CA, NY)"),
    },
    async ({ state }) => runTool(() => handlers.getAlerts(state)),
  )

  // 工具 2️⃣：根据经纬度获取天气预报
  server.tool(
    "get_forecast",
    "Get weather forecast for a location",
    {
      latitude: z.number().describe("Latitude of the location"),
      longitude: z.number().describe("Longitude of the location"),
    },
    async ({ latitude, longitude }) => runTool(() => handlers.getForecast(latitude, longitude)),
  )

  return server
}
