import { z } from "zod"
import { NWS_API_BASE, REQUEST_TIMEOUT_MS, USER_AGENT } from "./server/api"

export class ConfigError extends Error {
  override readonly name = "ConfigError"
}

// 环境变量为空字符串时视为未设置
const unsetWhenEmpty = (value: unknown) => (value === "" ? undefined : value)

const serverEnvSchema = z.object({
  NWS_API_BASE: z.preprocess(unsetWhenEmpty, z.string().url().default(NWS_API_BASE)),
  NWS_USER_AGENT: z.preprocess(unsetWhenEmpty, z.string().default(USER_AGENT)),
  NWS_TIMEOUT_MS: z.preprocess(unsetWhenEmpty, z.coerce.number().int().positive().default(REQUEST_TIMEOUT_MS)),
})

const clientEnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(unsetWhenEmpty, z.string({ required_error: "请在 .env 文件中设置 OPENAI_API_KEY" })),
  BASE_URL: z.preprocess(unsetWhenEmpty, z.string().url().optional()),
  MODEL: z.preprocess(unsetWhenEmpty, z.string().default("Qwen/QwQ-32B")),
})

export interface ServerConfig {
  apiBase: string
  userAgent: string
  timeoutMs: number
}

export interface ClientConfig {
  apiKey: string
  baseURL: string | undefined
  model: string
}

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv): z.infer<S> {
  const parsed = schema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new ConfigError(`❌ 环境变量配置错误 ${problems.join("; ")}`)
  }
  return parsed.data
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed: z.infer<typeof serverEnvSchema> = parseEnv(serverEnvSchema, env)
  return {
    // 去掉末尾斜杠，拼接路径时不出现 //
    apiBase: parsed.NWS_API_BASE.replace(/\/+$/, ""),
    userAgent: parsed.NWS_USER_AGENT,
    timeoutMs: parsed.NWS_TIMEOUT_MS,
  }
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed: z.infer<typeof clientEnvSchema> = parseEnv(clientEnvSchema, env)
  return {
    apiKey: parsed.OPENAI_API_KEY,
    baseURL: parsed.BASE_URL,
    model: parsed.MODEL,
  }
}
