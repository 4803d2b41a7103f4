import type { ConfigService } from './configService'
import type { AdapterResolver } from '../providers/types'
import type { Session } from '../types'
import { describeError } from '../errors'
import { t } from '../i18n'
import { createLogger } from '../logger'

const log = createLogger('Title')

/** 生成标题的最大长度（字符） */
export const MAX_TITLE_LENGTH = 30
/** 回退标题取用户首条消息的前 N 个字符 */
export const HEURISTIC_TITLE_LENGTH = 20

const QUOTE_CHARS = `"'“”‘’「」『』《》\``
const LEADING_QUOTES = new RegExp(`^[${QUOTE_CHARS}]+`)
const TRAILING_QUOTES = new RegExp(`[${QUOTE_CHARS}]+$`)

function stripQuotes(text: string): string {
  return text.replace(LEADING_QUOTES, '').replace(TRAILING_QUOTES, '').trim()
}

/** 按字符（而非 UTF-16 码元）截断 */
function takeChars(text: string, count: number): string[] {
  return Array.from(text).slice(0, count)
}

/** 清理模型返回的标题：取首个非空行，去掉 "标题:" 前缀、引号和句末标点 */
export function cleanTitle(raw: string): string {
  const firstLine = raw.split(/\r?\n/).find((line) => line.trim() !== '') ?? ''
  let title = stripQuotes(firstLine.trim().replace(/^#+\s*/, ''))
  title = stripQuotes(title.replace(/^(标题|title)\s*[:：]\s*/i, ''))
  title = title.replace(/[。.！!]+$/, '').trim()
  return takeChars(title, MAX_TITLE_LENGTH).join('').trim()
}

/** 回退标题：用户首条消息压缩空白后取前 20 个字符，截断时追加省略号 */
export function heuristicTitle(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim()
  const chars = Array.from(collapsed)
  if (chars.length <= HEURISTIC_TITLE_LENGTH) return collapsed
  return `${takeChars(collapsed, HEURISTIC_TITLE_LENGTH).join('')}…`
}

/**
 * 标题生成：首轮回复完成后为占位标题的会话起名
 * 只返回候选标题，由会话服务在写入前再次确认标题未被用户修改
 */
export class TitleService {
  constructor(
    private readonly config: ConfigService,
    private readonly adapters: AdapterResolver
  ) {}

  /** 是否满足生成条件：占位标题、开启自动命名、恰好完成了第一条回复 */
  shouldGenerate(session: Session): boolean {
    if (session.titleSource !== 'default') return false
    if (!this.config.get().session.autoRename) return false
    const completedReplies = session.messages.filter((m) => m.role === 'assistant' && m.state === 'complete')
    return completedReplies.length === 1 && session.messages.some((m) => m.role === 'user')
  }

  /** 生成标题；不满足条件返回 null，从不抛出 */
  async maybeGenerateTitle(session: Session): Promise<string | null> {
    if (!this.shouldGenerate(session)) return null
    const firstUser = session.messages.find((m) => m.role === 'user')
    if (!firstUser) return null

    const fallback = heuristicTitle(firstUser.content) || null
    try {
      const adapter = this.adapters(session.provider)
      const response = await adapter.complete(
        {
          model: session.model,
          messages: [{ role: 'user', content: t('title.prompt', { message: takeChars(firstUser.content, 500).join('') }) }],
          temperature: 0.5,
          maxTokens: 50
        },
        AbortSignal.timeout(this.config.get().request.timeoutMs)
      )
      const title = cleanTitle(response.content)
      if (title) {
        log.info(`标题已生成 session=${session.id}: ${title}`)
        return title
      }
      log.warn(`模型返回空标题，使用回退标题 session=${session.id}`)
    } catch (err) {
      log.warn(`标题生成失败，使用回退标题 session=${session.id}: ${describeError(err)}`)
    }
    return fallback
  }
}
