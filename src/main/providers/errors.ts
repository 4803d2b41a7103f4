import {
  ChatError,
  ConfigError,
  ProviderError,
  RateLimitedError,
  TransientNetworkError
} from '../errors'
import { t } from '../i18n'
import type { ProviderName } from '../types'
import { BUILTIN_PROVIDERS } from './catalog'

/** 连接层错误（重置、拒绝、DNS、超时） */
const CONNECTION_PATTERNS =
  /ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|EPIPE|socket hang up|fetch failed|connection error|network error|timed? ?out/i

/** SDK 未拿到密钥时的报错 */
const MISSING_KEY_PATTERN = /no api key/i

/** 错误文本中的 HTTP 状态码（OpenAI SDK 以 "401 ..." 开头） */
export function extractStatus(detail: string): number | undefined {
  const match = /^(\d{3})\b/.exec(detail.trim())
  return match ? Number(match[1]) : undefined
}

/**
 * 将提供商返回的错误文本映射为 ChatError
 * 401/403 → 配置错误；429 → 限流；408/5xx/连接错误 → 可重试；其余 → 提供商错误
 */
export function classifyProviderError(detail: string, provider: ProviderName): ChatError {
  const label = BUILTIN_PROVIDERS[provider].label
  const status = extractStatus(detail)

  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return new ConfigError(t('errors.apiKeyInvalid', { provider: label, status }))
    }
    if (status === 429) {
      return new RateLimitedError(t('errors.rateLimited', { provider: label }))
    }
    if (status === 408 || status >= 500) {
      return new TransientNetworkError(t('errors.serverUnavailable', { provider: label, status }))
    }
    if (status >= 400) {
      return new ProviderError(
        t('errors.providerRejected', { provider: label, status, detail: shorten(detail) })
      )
    }
  }

  if (MISSING_KEY_PATTERN.test(detail)) {
    return new ConfigError(t('errors.apiKeyMissing', { provider: label }))
  }
  if (CONNECTION_PATTERNS.test(detail)) {
    return new TransientNetworkError(t('errors.network', { provider: label }))
  }
  return new ProviderError(t('errors.provider', { provider: label, detail: shorten(detail) }))
}

/** 任意抛出值 → ChatError（已分类的原样返回） */
export function toProviderError(err: unknown, provider: ProviderName): ChatError {
  if (err instanceof ChatError) return err
  const detail = err instanceof Error ? err.message : String(err)
  const classified = classifyProviderError(detail, provider)
  if (err instanceof Error) classified.cause = err
  return classified
}

/** 去掉状态码前缀，截断过长的提供商原文 */
function shorten(detail: string): string {
  const text = detail.trim().replace(/^\d{3}\s*/, '')
  return text.length > 200 ? `${text.slice(0, 200)}…` : text
}
