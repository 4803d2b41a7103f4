export type {
  ChatEvent,
  ChatTurnStartEvent,
  ChatTextDeltaEvent,
  ChatTurnEndEvent,
  ChatTitleUpdatedEvent,
  ChatSessionDeletedEvent,
  ChatErrorEvent
} from './types'

export type { ChatFrontend, ChatFrontendCapabilities } from './ChatFrontend'

export { ChatFrontendRegistry } from './ChatFrontendRegistry'

export type { ChatGateway, GatewayResult } from './ChatGateway'

export { DefaultChatGateway } from './DefaultChatGateway'

export {
  operationContext,
  getOperationContext,
  createDesktopContext,
  createStartupContext,
  type OperationContext,
  type OperationSource
} from './OperationContext'
