import type { AssistantMessageEvent, Context, Model, SimpleStreamOptions } from '@mariozechner/pi-ai'
import type { ChatRequest, ProviderConfig, ProviderName, ProviderResponse } from '../types'

/** pi-ai 流式函数签名（streamSimple 满足该签名，测试可注入假实现） */
export type StreamFn = (
  model: Model<'openai-completions'>,
  context: Context,
  options?: SimpleStreamOptions
) => AsyncIterable<AssistantMessageEvent>

/**
 * 提供商适配器
 * 失败时抛出已分类的 ChatError；适配器本身不重试
 */
export interface ProviderAdapter {
  readonly name: ProviderName
  /** 非流式请求 */
  complete(request: ChatRequest, signal?: AbortSignal): Promise<ProviderResponse>
  /** 流式请求：逐块产出文本，收到结束事件后结束 */
  stream(request: ChatRequest, signal?: AbortSignal): AsyncIterable<string>
}

/** 根据配置创建适配器 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter

/** 按提供商名取适配器（读取最新配置） */
export type AdapterResolver = (provider: ProviderName) => ProviderAdapter
