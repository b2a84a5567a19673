// 引入 MCP Server 和 Stdio 传输模块
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import dotenv from "@dotenvx/dotenvx"
import { loadServerConfig } from "./config"
import { createNWSRequest } from "./server/api"
import { createWeatherServer } from "./server/tool"
import { createWeatherHandlers } from "./server/weather"

// 加载环境变量；stdout 是协议通道，dotenvx 不能往里输出
dotenv.config({ quiet: true })

// 主函数：通过 stdio 启动 MCP 服务器
async function main() {
  const config = loadServerConfig()
  const request = createNWSRequest({ userAgent: config.userAgent, timeoutMs: config.timeoutMs })
  const server = createWeatherServer(createWeatherHandlers(request, config.apiBase))

  // 终端输入输入传送给 MCP 服务器
  const transport = new StdioServerTransport()
  await server.connect(transport)
  console.error("✅ 天气服务运行在终端")
}

main().catch((error) => {
  console.error("❌ 天气服务启动失败:", error)
  process.exit(1)
})
