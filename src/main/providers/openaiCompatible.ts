import {
  streamSimple,
  type AssistantMessage,
  type AssistantMessageEvent,
  type Context,
  type Message,
  type Model,
  type TextContent
} from '@mariozechner/pi-ai'
import { ConfigError, TransientNetworkError } from '../errors'
import { t } from '../i18n'
import { createLogger } from '../logger'
import type { ChatRequest, ProviderConfig, ProviderName, ProviderResponse } from '../types'
import { BUILTIN_PROVIDERS, isReasoningModel } from './catalog'
import { toProviderError } from './errors'
import type { ProviderAdapter, StreamFn } from './types'

const log = createLogger('Provider')

type OpenAICompat = Model<'openai-completions'>['compat']

/**
 * OpenAI 兼容协议适配器基类
 * 构造 pi-ai Model（openai-completions），消费 streamSimple 的事件流
 */
export abstract class OpenAICompatibleAdapter implements ProviderAdapter {
  abstract readonly name: ProviderName

  constructor(
    protected readonly config: ProviderConfig,
    private readonly streamFn: StreamFn = streamSimple
  ) {}

  /** 提供商兼容性配置（子类覆盖） */
  protected compat(): OpenAICompat {
    return undefined
  }

  /** 额外请求头（子类覆盖） */
  protected headers(): Record<string, string> | undefined {
    return undefined
  }

  /** 构造 pi-ai Model 对象 */
  buildModel(modelId: string): Model<'openai-completions'> {
    const compat = this.compat()
    const headers = this.headers()
    return {
      id: modelId,
      name: modelId,
      api: 'openai-completions',
      provider: this.name,
      baseUrl: this.config.baseUrl,
      reasoning: isReasoningModel(modelId),
      input: ['text'],
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
      contextWindow: 128000,
      maxTokens: this.config.generation.maxTokens,
      ...(compat ? { compat } : {}),
      ...(headers ? { headers } : {})
    }
  }

  /** 会话历史 → pi-ai Context（system 消息并入 systemPrompt） */
  buildContext(request: ChatRequest): Context {
    const systemParts: string[] = []
    const messages: Message[] = []
    const now = Date.now()

    for (const entry of request.messages) {
      if (entry.role === 'system') {
        if (entry.content.trim()) systemParts.push(entry.content)
        continue
      }
      if (entry.role === 'user') {
        messages.push({ role: 'user', content: entry.content, timestamp: now })
        continue
      }
      const assistant: AssistantMessage = {
        role: 'assistant',
        content: [{ type: 'text', text: entry.content }],
        api: 'openai-completions',
        provider: this.name,
        model: request.model,
        usage: {
          input: 0,
          output: 0,
          cacheRead: 0,
          cacheWrite: 0,
          totalTokens: 0,
          cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 }
        },
        stopReason: 'stop',
        timestamp: now
      }
      messages.push(assistant)
    }

    return {
      ...(systemParts.length > 0 ? { systemPrompt: systemParts.join('\n\n') } : {}),
      messages
    }
  }

  async *stream(request: ChatRequest, signal?: AbortSignal): AsyncIterable<string> {
    for await (const event of this.events(request, signal)) {
      if (event.type === 'text_delta' && event.delta) {
        yield event.delta
      }
    }
  }

  async complete(request: ChatRequest, signal?: AbortSignal): Promise<ProviderResponse> {
    let done: AssistantMessage | undefined
    let finishReason = 'stop'
    for await (const event of this.events(request, signal)) {
      if (event.type === 'done') {
        done = event.message
        finishReason = event.reason
      }
    }
    const content = (done?.content ?? [])
      .filter((c): c is TextContent => c.type === 'text')
      .map((c) => c.text)
      .join('')
    return { content, model: done?.model || request.model, finishReason }
  }

  /**
   * 事件流：出错时抛出已分类的 ChatError
   * 未收到 done 就结束视为连接中断（可重试）
   */
  private async *events(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<AssistantMessageEvent> {
    const apiKey = this.requireApiKey()
    const model = this.buildModel(request.model)
    const context = this.buildContext(request)
    log.info(`请求 provider=${this.name} model=${request.model} messages=${context.messages.length}`)

    let finished = false
    try {
      const events = this.streamFn(model, context, {
        apiKey,
        signal,
        temperature: request.temperature,
        maxTokens: request.maxTokens
      })
      for await (const event of events) {
        if (event.type === 'error') {
          const detail = event.error.errorMessage ?? event.reason
          log.warn(`提供商返回错误 provider=${this.name}: ${detail}`)
          throw toProviderError(new Error(detail), this.name)
        }
        yield event
        if (event.type === 'done') {
          finished = true
          return
        }
      }
    } catch (err) {
      throw toProviderError(err, this.name)
    }
    if (!finished) {
      throw new TransientNetworkError(
        t('errors.streamInterrupted', { provider: BUILTIN_PROVIDERS[this.name].label })
      )
    }
  }

  /** 未配置 API Key 时在发起网络请求前失败 */
  protected requireApiKey(): string {
    if (!this.config.apiKey) {
      throw new ConfigError(t('errors.apiKeyMissing', { provider: BUILTIN_PROVIDERS[this.name].label }))
    }
    return this.config.apiKey
  }
}
