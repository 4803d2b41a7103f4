import { t } from './i18n'

/** 错误类别（展示层据此决定提示方式） */
export type ErrorKind =
  | 'config'
  | 'network'
  | 'rate_limited'
  | 'provider'
  | 'invalid_state'
  | 'persistence'
  | 'not_found'

/** 展示层可见的错误：类别 + 简短本地化文案，不含堆栈 */
export interface UserError {
  kind: ErrorKind
  message: string
}

/**
 * 业务错误基类
 * message 在抛出处已本地化，可直接展示给用户
 */
export abstract class ChatError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** 配置缺失或无效（API Key 未配置、被拒绝、设置值非法） */
export class ConfigError extends ChatError {
  readonly kind = 'config'
}

/** 可重试的网络错误（连接失败、超时、5xx） */
export class TransientNetworkError extends ChatError {
  readonly kind = 'network'
}

/** 提供商限流（429） */
export class RateLimitedError extends ChatError {
  readonly kind = 'rate_limited'
}

/** 提供商返回的不可重试错误 */
export class ProviderError extends ChatError {
  readonly kind = 'provider'
}

/** 当前状态不允许该操作（如生成中再次提交） */
export class InvalidStateError extends ChatError {
  readonly kind = 'invalid_state'
}

/** 数据库读写失败 */
export class PersistenceError extends ChatError {
  readonly kind = 'persistence'
}

/** 会话或消息不存在 */
export class NotFoundError extends ChatError {
  readonly kind = 'not_found'
}

/** 是否值得重试（网络抖动、限流） */
export function isTransient(err: unknown): boolean {
  return err instanceof TransientNetworkError || err instanceof RateLimitedError
}

/** 转换为展示层错误；未知错误归为 provider 并使用通用文案 */
export function toUserError(err: unknown): UserError {
  if (err instanceof ChatError) {
    return { kind: err.kind, message: err.message }
  }
  return { kind: 'provider', message: t('errors.unknown') }
}

/** 提取错误描述（仅用于日志） */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
