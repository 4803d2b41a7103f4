import { setTimeout as delay } from 'timers/promises'
import { v7 as uuidv7 } from 'uuid'
import { TransientNetworkError, describeError, isTransient, toUserError, type UserError } from '../errors'
import { t } from '../i18n'
import { createLogger } from '../logger'
import { BUILTIN_PROVIDERS } from '../providers/catalog'
import type { ProviderAdapter } from '../providers/types'
import type { ChatRequest } from '../types'
import { abortable, createDeferred } from '../utils/async'

const log = createLogger('Stream')

/** 重试与超时策略 */
export interface TurnPolicy {
  maxRetries: number
  baseDelayMs: number
  /** 无数据超时：每收到一块数据重新计时 */
  timeoutMs: number
}

export const DEFAULT_TURN_POLICY: TurnPolicy = { maxRetries: 2, baseDelayMs: 1000, timeoutMs: 60_000 }

/** 一轮生成的终态 */
export type StreamOutcome = 'complete' | 'error' | 'cancelled'

export interface TurnResult {
  outcome: StreamOutcome
  text: string
  error?: UserError
}

/** 生成回调：onComplete / onError / onCancelled 每轮恰好触发一个 */
export interface TurnCallbacks {
  onDelta(chunk: string): void
  onComplete(): void
  onError(error: UserError): void
  onCancelled(): void
}

export interface TurnRequest {
  sessionId: string
  request: ChatRequest
  /** false → 非流式请求，完整结果作为单个 delta 交付 */
  stream: boolean
}

/** 可取消的等待（测试注入假实现） */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>

const defaultSleep: SleepFn = (ms, signal) => delay(ms, undefined, { signal })

/**
 * 单轮生成句柄
 * 终态只落定一次，之后的 delta 和回调全部丢弃
 */
export class StreamHandle {
  readonly id = uuidv7()
  private readonly controller = new AbortController()
  private readonly result = createDeferred<TurnResult>()
  private accumulated = ''
  private outcome: StreamOutcome | null = null

  constructor(
    readonly sessionId: string,
    private readonly callbacks: TurnCallbacks
  ) {}

  /** 已交付的全部文本 */
  get text(): string {
    return this.accumulated
  }

  get cancelled(): boolean {
    return this.outcome === 'cancelled'
  }

  get isSettled(): boolean {
    return this.outcome !== null
  }

  /** 取消信号（传给传输层和退避等待） */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  /** 终态结果 */
  get done(): Promise<TurnResult> {
    return this.result.promise
  }

  /** 取消生成：立即触发 onCancelled，之后不再有 delta */
  cancel(): boolean {
    if (this.outcome !== null) return false
    this.outcome = 'cancelled'
    this.controller.abort()
    this.notify('onCancelled', () => this.callbacks.onCancelled())
    this.result.resolve({ outcome: 'cancelled', text: this.accumulated })
    return true
  }

  /** 交付一块文本；已落定时返回 false */
  deliver(chunk: string): boolean {
    if (this.outcome !== null) return false
    this.accumulated += chunk
    this.notify('onDelta', () => this.callbacks.onDelta(chunk))
    return true
  }

  complete(): boolean {
    if (this.outcome !== null) return false
    this.outcome = 'complete'
    this.notify('onComplete', () => this.callbacks.onComplete())
    this.result.resolve({ outcome: 'complete', text: this.accumulated })
    return true
  }

  fail(error: UserError): boolean {
    if (this.outcome !== null) return false
    this.outcome = 'error'
    this.notify('onError', () => this.callbacks.onError(error))
    this.result.resolve({ outcome: 'error', text: this.accumulated, error })
    return true
  }

  private notify(name: string, fn: () => void): void {
    try {
      fn()
    } catch (err) {
      log.error(`回调 ${name} 执行失败 session=${this.sessionId}: ${describeError(err)}`)
    }
  }
}

export interface StreamOrchestratorOptions {
  /** 每轮开始时读取（配置变更对下一轮生效） */
  policy?: () => TurnPolicy
  sleep?: SleepFn
}

/**
 * 流式生成编排
 * 调用适配器、按序转发 delta、处理重试 / 超时 / 取消
 */
export class StreamOrchestrator {
  private readonly policy: () => TurnPolicy
  private readonly sleep: SleepFn

  constructor(options: StreamOrchestratorOptions = {}) {
    this.policy = options.policy ?? (() => DEFAULT_TURN_POLICY)
    this.sleep = options.sleep ?? defaultSleep
  }

  startTurn(turn: TurnRequest, adapter: ProviderAdapter, callbacks: TurnCallbacks): StreamHandle {
    const handle = new StreamHandle(turn.sessionId, callbacks)
    const policy = this.policy()
    log.info(
      `开始生成 session=${turn.sessionId} provider=${adapter.name} model=${turn.request.model} stream=${turn.stream}`
    )
    void this.run(handle, turn, adapter, policy).catch((err: unknown) => {
      log.error(`生成流程异常 session=${turn.sessionId}: ${describeError(err)}`)
      handle.fail(toUserError(err))
    })
    return handle
  }

  private async run(handle: StreamHandle, turn: TurnRequest, adapter: ProviderAdapter, policy: TurnPolicy): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      if (handle.isSettled) return
      try {
        await this.attempt(handle, turn, adapter, policy)
        if (handle.complete()) {
          log.info(`生成完成 session=${turn.sessionId} chars=${handle.text.length}`)
        }
        return
      } catch (err) {
        if (handle.isSettled) return

        // 已有文本交付后不重试，重试会重复已展示的内容
        const retriable = isTransient(err) && attempt < policy.maxRetries && handle.text === ''
        if (!retriable) {
          log.warn(`生成失败 session=${turn.sessionId} attempt=${attempt + 1}: ${describeError(err)}`)
          handle.fail(toUserError(err))
          return
        }

        const wait = policy.baseDelayMs * 2 ** attempt
        log.warn(`第 ${attempt + 1} 次请求失败，${wait}ms 后重试 session=${turn.sessionId}: ${describeError(err)}`)
        try {
          await this.sleep(wait, handle.signal)
        } catch (sleepErr) {
          if (handle.isSettled) return
          throw sleepErr
        }
      }
    }
  }

  /** 单次请求：超时或取消时中止传输 */
  private async attempt(
    handle: StreamHandle,
    turn: TurnRequest,
    adapter: ProviderAdapter,
    policy: TurnPolicy
  ): Promise<void> {
    const controller = new AbortController()
    const onCancel = (): void => controller.abort()
    handle.signal.addEventListener('abort', onCancel, { once: true })

    let timedOut = false
    let timer: NodeJS.Timeout | undefined
    const armTimer = (): void => {
      clearTimeout(timer)
      timer = setTimeout(() => {
        timedOut = true
        controller.abort()
      }, policy.timeoutMs)
    }

    try {
      armTimer()
      if (!turn.stream) {
        const response = await abortable(adapter.complete(turn.request, controller.signal), controller.signal)
        if (response.content) handle.deliver(response.content)
        return
      }

      const iterator = adapter.stream(turn.request, controller.signal)[Symbol.asyncIterator]()
      try {
        for (;;) {
          const next = await abortable(iterator.next(), controller.signal)
          if (next.done) return
          if (!handle.deliver(next.value)) return
          armTimer()
        }
      } finally {
        void iterator.return?.().catch((err: unknown) => {
          log.debug(`关闭响应流失败: ${describeError(err)}`)
        })
      }
    } catch (err) {
      if (timedOut && !handle.isSettled) {
        throw new TransientNetworkError(
          t('errors.timeout', {
            provider: BUILTIN_PROVIDERS[adapter.name].label,
            seconds: Math.round(policy.timeoutMs / 1000)
          }),
          { cause: err }
        )
      }
      throw err
    } finally {
      clearTimeout(timer)
      handle.signal.removeEventListener('abort', onCancel)
    }
  }
}
