import type { ChatEvent } from './types'
import type { ChatFrontend } from './ChatFrontend'
import { createLogger } from '../../logger'

const log = createLogger('ChatFrontend')

/** 需要 streaming 能力的事件类型 */
const STREAMING_EVENT_TYPES = new Set<ChatEvent['type']>(['text_delta'])

/**
 * 聊天前端注册中心：会话级绑定 + 能力感知广播
 *
 * 绑定模型：
 * - 默认前端（registerDefault）：自动绑定到所有会话
 * - 会话级额外绑定（bind）：仅接收指定会话的事件
 */
export class ChatFrontendRegistry {
  /** 默认前端：自动绑定到所有会话（如桌面主窗口） */
  private defaultFrontends = new Map<string, ChatFrontend>()
  /** 会话级额外绑定：sessionId → (frontendId → ChatFrontend) */
  private sessionBindings = new Map<string, Map<string, ChatFrontend>>()

  /** 注册默认前端（绑定到所有现有和未来的会话），同 id 覆盖 */
  registerDefault(frontend: ChatFrontend): void {
    this.defaultFrontends.set(frontend.id, frontend)
    log.info(`注册默认前端: ${frontend.id}`)
  }

  /** 为指定会话绑定额外前端 */
  bind(sessionId: string, frontend: ChatFrontend): void {
    let map = this.sessionBindings.get(sessionId)
    if (!map) {
      map = new Map()
      this.sessionBindings.set(sessionId, map)
    }
    map.set(frontend.id, frontend)
    log.info(`绑定前端: ${frontend.id} → session=${sessionId}`)
  }

  /** 解除指定会话的某前端绑定 */
  unbind(sessionId: string, frontendId: string): void {
    const map = this.sessionBindings.get(sessionId)
    if (map) {
      map.delete(frontendId)
      if (map.size === 0) this.sessionBindings.delete(sessionId)
    }
    log.info(`解绑前端: ${frontendId} ← session=${sessionId}`)
  }

  /** 注销前端（从默认列表 + 所有会话绑定中移除） */
  unregister(frontendId: string): void {
    this.remove(frontendId)
    log.info(`注销前端: ${frontendId}`)
  }

  /** 获取指定会话的所有生效前端（默认 + 额外绑定），去重 */
  getFrontends(sessionId: string): ChatFrontend[] {
    const result = new Map<string, ChatFrontend>(this.defaultFrontends)
    const sessionMap = this.sessionBindings.get(sessionId)
    if (sessionMap) {
      for (const [id, frontend] of sessionMap) {
        result.set(id, frontend)
      }
    }
    return Array.from(result.values())
  }

  /**
   * 能力感知广播：发给该会话的所有绑定前端
   * text_delta 仅发给 streaming=true 的前端，其他事件发给所有绑定前端
   * 会话删除后同时清理该会话的额外绑定
   */
  broadcast(event: ChatEvent): void {
    const frontends = this.getFrontends(event.sessionId)
    const isStreaming = STREAMING_EVENT_TYPES.has(event.type)

    for (const frontend of frontends) {
      // 清理已断开的前端
      if (!frontend.isAlive()) {
        this.remove(frontend.id)
        log.info(`清理已断开前端: ${frontend.id}`)
        continue
      }
      if (isStreaming && !frontend.capabilities.streaming) continue

      try {
        frontend.sendEvent(event)
      } catch (err) {
        log.warn(`发送事件失败 frontend=${frontend.id}: ${err}`)
      }
    }

    if (event.type === 'session_deleted') {
      this.sessionBindings.delete(event.sessionId)
    }
  }

  /** 从默认列表 + 所有会话绑定中移除 */
  private remove(frontendId: string): void {
    this.defaultFrontends.delete(frontendId)
    for (const [sessionId, map] of this.sessionBindings) {
      map.delete(frontendId)
      if (map.size === 0) this.sessionBindings.delete(sessionId)
    }
  }
}
