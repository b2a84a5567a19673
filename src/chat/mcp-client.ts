import { Client } from "@modelcontextprotocol/sdk/client/index.js" // MCP 客户端核心类
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js" // 用于通过 stdio 通信的传输层
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js"
import readline from "readline/promises" // 用于命令行交互
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions"
import { z } from "zod"
import type { ChatModel } from "./model"

export const SYSTEM_PROMPT = "你是一个智能助手。"
export const NO_TOOL_RESULT = "[工具无结果返回]"
export const NO_CONTENT = "[无返回内容]"

const toolArgumentsSchema = z.record(z.unknown())

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
})

// 根据脚本后缀选择启动命令（.py 用 python，.ts 通过 tsx 运行，.js 直接用 Node）
export function serverCommandFor(serverScriptPath: string): { command: string; args: string[] } {
  if (serverScriptPath.endsWith(".py")) {
    return { command: process.platform === "win32" ? "python" : "python3", args: [serverScriptPath] }
  }
  if (serverScriptPath.endsWith(".ts")) {
    return { command: process.execPath, args: ["--import", "tsx", serverScriptPath] }
  }
  if (serverScriptPath.endsWith(".js")) {
    return { command: process.execPath, args: [serverScriptPath] }
  }
  throw new Error("❌ 服务器脚本必须是 .js、.ts 或 .py 文件")
}

// MCP + 对话模型 客户端类
export class MCPClient {
  tools: ChatCompletionTool[] = [] // 工具列表

  constructor(
    private readonly model: ChatModel,
    readonly mcp: Client = new Client({ name: "mcp-client-openai", version: "1.0.0" }),
  ) {}

  // 启动服务器脚本，并建立 stdio 通信
  async connectToServer(serverScriptPath: string) {
    const { command, args } = serverCommandFor(serverScriptPath)
    await this.connect(new StdioClientTransport({ command, args }))
  }

  async connect(transport: Transport) {
    await this.mcp.connect(transport)

    // 获取服务器暴露的工具信息，转换成 OpenAI function 工具
    const toolsResult = await this.mcp.listTools()
    this.tools = toolsResult.tools.map<ChatCompletionTool>((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema,
        strict: false, // Qwen 特有字段，OpenAI 可忽略
      },
    }))

    console.log(
      "✅ 已连接服务器，支持工具：",
      this.tools.map((t) => t.function.name),
    )
  }

  // 使用 MCP 调用工具，取第一段文本结果
  private async callTool(toolCall: ChatCompletionMessageToolCall): Promise<string> {
    const args = toolArgumentsSchema.parse(JSON.parse(toolCall.function.arguments || "{}"))

    console.log(`\n🔧 调用工具：${toolCall.function.name}`)
    console.log(`📦 参数：${JSON.stringify(args)}`)

    const result = toolResultSchema.safeParse(await this.mcp.callTool({ name: toolCall.function.name, arguments: args }))
    if (!result.success) return NO_TOOL_RESULT
    return result.data.content.find((item) => item.type === "text")?.text ?? NO_TOOL_RESULT
  }

  // 处理用户提问
  async processQuery(query: string): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: query },
    ]

    try {
      // 第一次请求模型，看是否需要调用工具
      const message = await this.model.complete(messages, this.tools)
      const toolCalls = message.tool_calls ?? []

      // 如果没有工具调用，直接返回模型回复
      if (toolCalls.length === 0) return message.content || NO_CONTENT

      // 把调用过程加入对话上下文
      messages.push({ role: "assistant", content: null, tool_calls: toolCalls })
      for (const toolCall of toolCalls) {
        messages.push({ role: "tool", tool_call_id: toolCall.id, content: await this.callTool(toolCall) })
      }

      // 再次请求模型，获取基于工具结果的最终回复
      const finalMessage = await this.model.complete(messages)
      return finalMessage.content || NO_CONTENT
    } catch (err) {
      return `❌ 模型请求出错: ${err instanceof Error ? err.message : String(err)}`
    }
  }

  // 启动命令行对话循环，逐行读取输入；空行跳过，quit 退出
  async chatLoop(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    const rl = readline.createInterface({ input, output })
    let closed = false
    rl.once("close", () => {
      closed = true
    })
    rl.setPrompt("\nQuery: ")

    console.log("✅ MCP Client 启动完成")
    console.log("💬 输入你的问题，或输入 'quit' 退出")

    try {
      rl.prompt()
      for await (const line of rl) {
        const query = line.trim()
        if (query.toLowerCase() === "quit") break

        if (query) output.write(`\n🧠 回复：\n${await this.processQuery(query)}\n`)
        rl.prompt()
      }
    } finally {
      if (!closed) rl.close()
    }
  }

  // 关闭 MCP 连接
  async cleanup() {
    await this.mcp.close()
  }
}
