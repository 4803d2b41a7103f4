import type { ImportedSession, SessionService } from './sessionService'
import type { MessageRole, Session } from '../types'
import { isProviderName } from '../types'
import { InvalidStateError } from '../errors'
import { t, translationsOf } from '../i18n'
import { createLogger } from '../logger'

const log = createLogger('Export')

export interface ExportOptions {
  /** 输出创建时间与每条消息的时间（默认不输出，保证多次导出结果一致） */
  includeTimestamps?: boolean
}

const SYSTEM_PROMPT_MARKER = '<!-- system-prompt -->'
const MARKER_PATTERN = /^<!-- (system-prompt|message:(user|assistant|system)) -->$/
const MODEL_LINE_PATTERN = /^\*\*[^*]+\*\*: (.+) \(([\w-]+)\)$/
const TIMESTAMP_LINE_PATTERN = /^\*(\d{4}-\d{2}-\d{2}T[\d:.]+Z)\*$/
const CREATED_AT_LINE_PATTERN = /^\*\*([^*]+)\*\*: \d{4}-\d{2}-\d{2}T[\d:.]+Z$/
/** 正文中形如标记的行（含已转义的），导出时前加一个反斜杠 */
const MARKER_LIKE_PATTERN = /^\\*<!-- (?:system-prompt|message:(?:user|assistant|system)) -->\r?$/
const ESCAPED_MARKER_PATTERN = /^\\+<!-- (?:system-prompt|message:(?:user|assistant|system)) -->$/

function escapeBody(text: string): string {
  return text
    .split('\n')
    .map((line) => (MARKER_LIKE_PATTERN.test(line) ? `\\${line}` : line))
    .join('\n')
}

function unescapeBody(lines: string[]): string[] {
  return lines.map((line) => (ESCAPED_MARKER_PATTERN.test(line) ? line.slice(1) : line))
}

function roleLabel(role: MessageRole): string {
  return t(`roles.${role}`)
}

/**
 * 会话 → Markdown
 *
 * ```
 * # 标题
 *
 * **AI模型**: deepseek-chat (deepseek)
 *
 * ---
 *
 * <!-- message:user -->
 * ## 用户
 *
 * 内容
 * ```
 */
export function renderSessionMarkdown(session: Session, options: ExportOptions = {}): string {
  const parts: string[] = [`# ${session.title}\n\n`, `**${t('export.model')}**: ${session.model} (${session.provider})\n`]
  if (options.includeTimestamps) {
    parts.push(`**${t('export.createdAt')}**: ${new Date(session.createdAt).toISOString()}\n`)
  }
  parts.push('\n---\n\n')

  if (session.systemPrompt.trim()) {
    parts.push(`${SYSTEM_PROMPT_MARKER}\n## ${t('export.systemPrompt')}\n\n${escapeBody(session.systemPrompt)}\n\n`)
  }

  for (const message of session.messages) {
    if (message.state === 'partial') continue
    parts.push(`<!-- message:${message.role} -->\n## ${roleLabel(message.role)}\n\n${escapeBody(message.content)}\n\n`)
    if (options.includeTimestamps) {
      parts.push(`*${new Date(message.createdAt).toISOString()}*\n\n`)
    }
  }

  return parts.join('').replace(/\n+$/, '\n')
}

/** 去掉块尾部的空行 */
function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length
  while (end > 0 && lines[end - 1].trim() === '') end--
  return lines.slice(0, end)
}

/** Markdown → 会话内容（识别任意语言导出的文件） */
export function parseSessionMarkdown(markdown: string): ImportedSession {
  const lines = markdown.replace(/\r\n/g, '\n').split('\n')
  const titleLine = lines.find((line) => line.startsWith('# '))
  if (titleLine === undefined) {
    throw new InvalidStateError(t('errors.invalidImport'))
  }

  const markers: Array<{ index: number; kind: 'system-prompt' | MessageRole }> = []
  let provider: ImportedSession['provider']
  let model: string | undefined
  // 只有带创建时间的导出文件，消息末尾才有时间行
  let hasTimestamps = false
  lines.forEach((line, index) => {
    const marker = MARKER_PATTERN.exec(line)
    if (marker) {
      const role = marker[2]
      markers.push({ index, kind: role === 'user' || role === 'assistant' || role === 'system' ? role : 'system-prompt' })
      return
    }
    if (markers.length === 0) {
      const createdAt = CREATED_AT_LINE_PATTERN.exec(line)
      if (createdAt && translationsOf('export.createdAt').includes(createdAt[1])) hasTimestamps = true
    }
    if (markers.length === 0 && model === undefined) {
      const modelLine = MODEL_LINE_PATTERN.exec(line)
      if (modelLine && isProviderName(modelLine[2])) {
        model = modelLine[1]
        provider = modelLine[2]
      }
    }
  })

  const title = titleLine.slice(2).trim()
  const result: ImportedSession = {
    title: translationsOf('session.defaultTitle').includes(title) ? '' : title,
    provider,
    model,
    systemPrompt: '',
    messages: []
  }

  markers.forEach((marker, i) => {
    // 标记行之后依次是 "## 角色"、空行、正文
    const end = i + 1 < markers.length ? markers[i + 1].index : lines.length
    let body = trimTrailingBlank(lines.slice(marker.index + 3, end))
    let createdAt: number | undefined
    const stamp =
      hasTimestamps && marker.kind !== 'system-prompt' && body.length > 0
        ? TIMESTAMP_LINE_PATTERN.exec(body[body.length - 1])
        : null
    if (stamp) {
      createdAt = Date.parse(stamp[1])
      body = trimTrailingBlank(body.slice(0, -1))
    }
    const content = unescapeBody(body).join('\n')
    if (marker.kind === 'system-prompt') {
      result.systemPrompt = content
    } else {
      result.messages.push({ role: marker.kind, content, ...(createdAt !== undefined ? { createdAt } : {}) })
    }
  })

  return result
}

/**
 * 导出 / 导入服务
 */
export class ExportService {
  constructor(private readonly sessions: SessionService) {}

  /** 导出会话为 Markdown（生成中的消息不导出） */
  exportSessionMarkdown(id: string, options: ExportOptions = {}): string {
    const session = this.sessions.getSession(id)
    log.info(`导出会话 ${id} messages=${session.messages.length}`)
    return renderSessionMarkdown(session, options)
  }

  /** 导入 Markdown 为新会话 */
  importSessionMarkdown(markdown: string): Session {
    return this.sessions.importSession(parseSessionMarkdown(markdown))
  }
}
