import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { parseSessionMarkdown, renderSessionMarkdown } from '../exportService'
import { createChatCore, type ChatCore } from '../../index'
import { InvalidStateError } from '../../errors'
import { ScriptedAdapter } from '../../__tests__/fakes'
import type { Session } from '../../types'

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 's1',
    title: 'Rust 入门',
    titleSource: 'user',
    provider: 'deepseek',
    model: 'deepseek-chat',
    systemPrompt: '简洁回答',
    createdAt: 0,
    updatedAt: 2000,
    messages: [
      { id: 'm1', sessionId: 's1', role: 'user', content: '什么是所有权？', state: 'complete', model: '', createdAt: 1000 },
      {
        id: 'm2',
        sessionId: 's1',
        role: 'assistant',
        content: '每个值有唯一的所有者。\n\n离开作用域时释放。',
        state: 'complete',
        model: 'deepseek-chat',
        createdAt: 2000
      }
    ],
    status: 'idle',
    ...overrides
  }
}

const EXPECTED = [
  '# Rust 入门',
  '',
  '**AI模型**: deepseek-chat (deepseek)',
  '',
  '---',
  '',
  '<!-- system-prompt -->',
  '## 系统提示',
  '',
  '简洁回答',
  '',
  '<!-- message:user -->',
  '## 用户',
  '',
  '什么是所有权？',
  '',
  '<!-- message:assistant -->',
  '## AI助手',
  '',
  '每个值有唯一的所有者。',
  '',
  '离开作用域时释放。',
  ''
].join('\n')

describe('renderSessionMarkdown', () => {
  it('输出标题、模型、系统提示和消息', () => {
    expect(renderSessionMarkdown(makeSession())).toBe(EXPECTED)
  })

  it('多次导出结果一致', () => {
    const session = makeSession()
    expect(renderSessionMarkdown(session)).toBe(renderSessionMarkdown(session))
  })

  it('可选输出时间', () => {
    const markdown = renderSessionMarkdown(makeSession({ systemPrompt: '', messages: makeSession().messages.slice(0, 1) }), {
      includeTimestamps: true
    })
    expect(markdown).toBe(
      [
        '# Rust 入门',
        '',
        '**AI模型**: deepseek-chat (deepseek)',
        '**创建时间**: 1970-01-01T00:00:00.000Z',
        '',
        '---',
        '',
        '<!-- message:user -->',
        '## 用户',
        '',
        '什么是所有权？',
        '',
        '*1970-01-01T00:00:01.000Z*',
        ''
      ].join('\n')
    )
  })

  it('不导出生成中的消息', () => {
    const session = makeSession()
    session.messages[1].state = 'partial'
    expect(renderSessionMarkdown(session)).not.toContain('<!-- message:assistant -->')
  })
})

describe('parseSessionMarkdown', () => {
  it('解析导出的内容', () => {
    expect(parseSessionMarkdown(EXPECTED)).toEqual({
      title: 'Rust 入门',
      provider: 'deepseek',
      model: 'deepseek-chat',
      systemPrompt: '简洁回答',
      messages: [
        { role: 'user', content: '什么是所有权？' },
        { role: 'assistant', content: '每个值有唯一的所有者。\n\n离开作用域时释放。' }
      ]
    })
  })

  it('解析时间并兼容 CRLF', () => {
    const markdown = renderSessionMarkdown(makeSession(), { includeTimestamps: true }).replace(/\n/g, '\r\n')
    const parsed = parseSessionMarkdown(markdown)
    expect(parsed.messages.map((m) => m.createdAt)).toEqual([1000, 2000])
    expect(parsed.messages[1].content).toBe('每个值有唯一的所有者。\n\n离开作用域时释放。')
  })

  it('正文中形如标记的行转义后原样导回', () => {
    const messages: Session['messages'] = [
      {
        id: 'm1',
        sessionId: 's1',
        role: 'user',
        content: 'before\n<!-- message:assistant -->\nafter',
        state: 'complete',
        model: '',
        createdAt: 1000
      },
      {
        id: 'm2',
        sessionId: 's1',
        role: 'assistant',
        content: '\\<!-- system-prompt -->',
        state: 'complete',
        model: 'deepseek-chat',
        createdAt: 2000
      }
    ]
    const markdown = renderSessionMarkdown(makeSession({ systemPrompt: '', messages }))
    expect(markdown.split('\n')).toContain('\\<!-- message:assistant -->')

    expect(parseSessionMarkdown(markdown).messages).toEqual([
      { role: 'user', content: 'before\n<!-- message:assistant -->\nafter' },
      { role: 'assistant', content: '\\<!-- system-prompt -->' }
    ])
  })

  it('导出时未带时间，末行形如时间的正文保留', () => {
    const content = '日志如下\n*2024-01-01T00:00:00.000Z*'
    const session = makeSession({
      systemPrompt: '',
      messages: [{ id: 'm1', sessionId: 's1', role: 'user', content, state: 'complete', model: '', createdAt: 1000 }]
    })
    expect(parseSessionMarkdown(renderSessionMarkdown(session)).messages).toEqual([{ role: 'user', content }])
  })

  it('占位标题（任意语言）视为未命名', () => {
    expect(parseSessionMarkdown('# 新对话\n').title).toBe('')
    expect(parseSessionMarkdown('# New chat\n').title).toBe('')
  })

  it('缺少标题行时拒绝导入', () => {
    expect(() => parseSessionMarkdown('just text')).toThrow(InvalidStateError)
  })
})

describe('ExportService', () => {
  let dataDir: string
  let core: ChatCore

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'parley-export-test-'))
    const adapter = new ScriptedAdapter([{ chunks: ['回复'] }])
    core = createChatCore({ dataDir, inMemory: true, adapterFactory: () => adapter, sleep: async () => {} })
    core.config.setApiKey('deepseek', 'test-secret')
  })

  afterEach(() => {
    core.close()
    rmSync(dataDir, { recursive: true, force: true })
  })

  it('导出后再导入得到相同内容的新会话', async () => {
    const session = core.sessions.createSession({ systemPrompt: '简洁回答' })
    await core.sessions.submit(session.id, '你好')

    const markdown = core.exporter.exportSessionMarkdown(session.id)
    const imported = core.exporter.importSessionMarkdown(markdown)

    expect(imported.id).not.toBe(session.id)
    expect(imported).toMatchObject({ title: '测试标题', titleSource: 'user', systemPrompt: '简洁回答' })
    expect(imported.messages.map((m) => [m.role, m.content, m.state])).toEqual([
      ['user', '你好', 'complete'],
      ['assistant', '回复', 'complete']
    ])
    expect(core.exporter.exportSessionMarkdown(imported.id)).toBe(markdown)
  })

  it('导入占位标题的会话得到当前语言的默认标题', () => {
    const imported = core.exporter.importSessionMarkdown('# New chat\n\n---\n\n<!-- message:user -->\n## User\n\nhi\n')
    expect(imported).toMatchObject({ title: '新对话', titleSource: 'default' })
    expect(imported.messages[0].content).toBe('hi')
  })
})
