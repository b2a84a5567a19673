import type { OpenAI } from "openai" // OpenAI 官方 SDK
import type {
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions" // 聊天消息类型

// 对话模型：给定上下文和可用工具，返回一条助手消息
export interface ChatModel {
  complete(messages: ChatCompletionMessageParam[], tools?: ChatCompletionTool[]): Promise<ChatCompletionMessage>
}

export function createOpenAIChatModel(openai: OpenAI, model: string): ChatModel {
  return {
    async complete(messages, tools) {
      const response = await openai.chat.completions.create({
        model,
        messages,
        // 有工具时让模型自动决定是否调用
        ...(tools?.length ? { tools, tool_choice: "auto" as const, temperature: 0.7 } : {}),
        max_tokens: 1000,
      })

      const [choice] = response.choices
      if (!choice) throw new Error("模型没有返回任何内容")
      return choice.message
    },
  }
}
