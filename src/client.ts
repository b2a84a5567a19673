import dotenv from "@dotenvx/dotenvx"
import { OpenAI } from "openai" // OpenAI 官方 SDK
import { MCPClient } from "./chat/mcp-client"
import { createOpenAIChatModel } from "./chat/model"
import { loadClientConfig } from "./config"

// 加载环境变量
dotenv.config({ quiet: true })

// 主函数入口
async function main() {
  // 检查是否提供了服务器脚本路径
  const serverScriptPath = process.argv[2]
  if (!serverScriptPath) {
    console.log("用法: tsx src/client.ts <path_to_server_script>")
    return
  }

  // 读取环境变量，未设置 OPENAI_API_KEY 时直接报错
  const config = loadClientConfig()
  const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL })
  const mcpClient = new MCPClient(createOpenAIChatModel(openai, config.model))

  try {
    // 连接 MCP 工具服务器
    await mcpClient.connectToServer(serverScriptPath)
    // 启动交互循环
    await mcpClient.chatLoop()
  } finally {
    // 清理并退出
    await mcpClient.cleanup()
  }
}

// 启动程序
main().then(
  () => process.exit(0),
  (error) => {
    console.error(error instanceof Error ? error.message : error)
    process.exit(1)
  },
)
