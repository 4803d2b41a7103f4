/** 会话行（对应 DB 表 sessions） */
export interface SessionRow {
  id: string
  title: string
  /** default | generated | user */
  titleSource: string
  provider: string
  model: string
  systemPrompt: string
  createdAt: number
  updatedAt: number
}
