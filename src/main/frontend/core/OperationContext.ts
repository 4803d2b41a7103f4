import { AsyncLocalStorage } from 'node:async_hooks'
import { v4 as uuid } from 'uuid'

/** 操作来源：判别联合，新增入口只需添加新变体 */
export type OperationSource = { type: 'desktop' } | { type: 'startup' }

/** 操作上下文：每次用户操作一个实例 */
export interface OperationContext {
  requestId: string
  source: OperationSource
  sessionId?: string
  timestamp: number
}

/** 全局 AsyncLocalStorage 实例 */
export const operationContext = new AsyncLocalStorage<OperationContext>()

/** 读取当前上下文（run() 外返回 undefined） */
export function getOperationContext(): OperationContext | undefined {
  return operationContext.getStore()
}

/** 工厂：桌面端展示层发起的操作 */
export function createDesktopContext(sessionId?: string): OperationContext {
  return { requestId: uuid(), source: { type: 'desktop' }, sessionId, timestamp: Date.now() }
}

/** 工厂：启动流程（加载会话、创建默认会话） */
export function createStartupContext(): OperationContext {
  return { requestId: uuid(), source: { type: 'startup' }, timestamp: Date.now() }
}
