/** 消息行（对应 DB 表 messages） */
export interface MessageRow {
  id: string
  sessionId: string
  role: string
  content: string
  /** complete | aborted（partial 不落库） */
  state: string
  model: string
  createdAt: number
}
