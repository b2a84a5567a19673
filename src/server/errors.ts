import type { ZodError } from "zod"

/**
 * 上游返回的 JSON 在顶层结构确认后，内部字段仍不符合约定时抛出。
 * 由工具注册层转换为 isError 结果返回给调用方。
 */
export class UpstreamShapeError extends Error {
  override readonly name = "UpstreamShapeError"

  constructor(
    readonly context: string,
    readonly path: string,
    detail: string,
  ) {
    super(`Malformed upstream ${context} at "${path}": ${detail}`)
  }

  static fromZodError(context: string, error: ZodError): UpstreamShapeError {
    const [issue] = error.issues
    if (!issue) return new UpstreamShapeError(context, "", error.message)
    return new UpstreamShapeError(context, issue.path.join("."), issue.message)
  }
}
