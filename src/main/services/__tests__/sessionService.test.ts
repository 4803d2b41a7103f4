import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createChatCore, type ChatCore } from '../../index'
import { StorageService } from '../storage'
import {
  ConfigError,
  InvalidStateError,
  NotFoundError,
  PersistenceError,
  ProviderError
} from '../../errors'
import { RecordingFrontend, ScriptedAdapter } from '../../__tests__/fakes'
import { createDeferred } from '../../utils/async'

let dataDir: string
let core: ChatCore
let adapter: ScriptedAdapter
let frontend: RecordingFrontend

beforeEach(() => {
  dataDir = mkdtempSync(join(tmpdir(), 'parley-session-test-'))
  adapter = new ScriptedAdapter()
  core = createChatCore({ dataDir, inMemory: true, adapterFactory: () => adapter, sleep: async () => {} })
  core.config.setApiKey('deepseek', 'test-secret')
  frontend = new RecordingFrontend()
  core.frontends.registerDefault(frontend)
})

afterEach(() => {
  vi.restoreAllMocks()
  core.close()
  rmSync(dataDir, { recursive: true, force: true })
})

describe('SessionService 会话管理', () => {
  it('启动时自动创建默认会话', () => {
    const sessions = core.sessions.listSessions()
    expect(sessions).toHaveLength(1)
    expect(sessions[0].title).toBe('新对话')
  })

  it('新会话使用默认提供商和模型', () => {
    const session = core.sessions.createSession()
    expect(session).toMatchObject({
      title: '新对话',
      titleSource: 'default',
      provider: 'deepseek',
      model: 'deepseek-chat',
      systemPrompt: '',
      status: 'idle',
      messages: []
    })
  })

  it('列表按最后活动时间倒序', () => {
    const now = vi.spyOn(Date, 'now')
    now.mockReturnValue(1000)
    const first = core.sessions.createSession()
    now.mockReturnValue(2000)
    const second = core.sessions.createSession()
    now.mockReturnValue(3000)
    core.sessions.appendUserMessage(first.id, 'hi')

    const ids = core.sessions
      .listSessions()
      .map((s) => s.id)
      .filter((id) => id === first.id || id === second.id)
    expect(ids).toEqual([first.id, second.id])
    expect(core.sessions.listSessions().find((s) => s.id === first.id)).toMatchObject({
      updatedAt: 3000,
      messageCount: 1
    })
  })

  it('重命名为空标题被拒绝，未知会话抛出 NotFoundError', () => {
    const session = core.sessions.createSession()
    expect(() => core.sessions.renameSession(session.id, '   ')).toThrow(InvalidStateError)
    expect(() => core.sessions.renameSession('missing', '标题')).toThrow(NotFoundError)
    expect(() => core.sessions.getSession('missing')).toThrow(NotFoundError)
    expect(core.sessions.findSession('missing')).toBeUndefined()
  })

  it('重命名后标题来源为 user 并广播事件', () => {
    const session = core.sessions.createSession()
    core.sessions.renameSession(session.id, '  学习计划 ')
    expect(core.sessions.getSession(session.id)).toMatchObject({ title: '学习计划', titleSource: 'user' })
    expect(frontend.events).toContainEqual({
      type: 'title_updated',
      sessionId: session.id,
      title: '学习计划',
      titleSource: 'user'
    })
  })

  it('getSession 返回副本', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'hi')
    const copy = core.sessions.getSession(session.id)
    copy.title = 'changed'
    copy.messages[0].content = 'changed'
    expect(core.sessions.getSession(session.id).title).toBe('新对话')
    expect(core.sessions.getSession(session.id).messages[0].content).toBe('hi')
  })

  it('会话数据在重新加载后保留', () => {
    const session = core.sessions.createSession({ systemPrompt: '你是一名助教' })
    core.sessions.renameSession(session.id, 'Rust 入门')
    core.sessions.setSessionModel(session.id, 'openrouter', 'x-ai/grok-3')
    core.sessions.appendUserMessage(session.id, '什么是所有权？')

    core.sessions.load()
    const loaded = core.sessions.getSession(session.id)
    expect(loaded).toMatchObject({
      title: 'Rust 入门',
      titleSource: 'user',
      provider: 'openrouter',
      model: 'x-ai/grok-3',
      systemPrompt: '你是一名助教',
      status: 'idle'
    })
    expect(loaded.messages.map((m) => [m.role, m.content, m.state])).toEqual([['user', '什么是所有权？', 'complete']])
  })

  it('统计消息数量与字符数', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, '你好')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    core.sessions.applyDelta(session.id, messageId, 'hello')
    core.sessions.finalizeMessage(session.id, messageId, 'complete')

    expect(core.sessions.getSessionStats(session.id)).toMatchObject({
      messageCount: 2,
      userMessages: 1,
      assistantMessages: 1,
      totalCharacters: 7
    })
  })

  it('清理没有消息的会话', () => {
    const kept = core.sessions.createSession()
    core.sessions.appendUserMessage(kept.id, 'keep me')
    core.sessions.createSession()

    // 启动时的默认会话 + 新建的空会话
    expect(core.sessions.cleanupEmptySessions()).toBe(2)
    expect(core.sessions.listSessions().map((s) => s.id)).toEqual([kept.id])
  })
})

describe('SessionService 消息状态机', () => {
  it('消息时间严格递增', () => {
    vi.spyOn(Date, 'now').mockReturnValue(5000)
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    core.sessions.beginAssistantMessage(session.id)
    expect(core.sessions.getSession(session.id).messages.map((m) => m.createdAt)).toEqual([5000, 5001])
  })

  it('生成中追加用户消息被拒绝', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    expect(core.sessions.getSession(session.id).status).toBe('awaiting_response')
    expect(() => core.sessions.appendUserMessage(session.id, 'again')).toThrow(InvalidStateError)
    expect(() => core.sessions.beginAssistantMessage(session.id)).toThrow(InvalidStateError)

    core.sessions.applyDelta(session.id, messageId, 'A')
    expect(core.sessions.getSession(session.id).status).toBe('streaming')
    expect(() => core.sessions.appendUserMessage(session.id, 'again')).toThrow(InvalidStateError)
  })

  it('空消息被拒绝', () => {
    const session = core.sessions.createSession()
    expect(() => core.sessions.appendUserMessage(session.id, ' \n ')).toThrow(InvalidStateError)
  })

  it('重复结束同一条消息无效果，迟到的 delta 被忽略', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    core.sessions.applyDelta(session.id, messageId, 'A')

    const saved = core.sessions.finalizeMessage(session.id, messageId, 'complete')
    expect(saved).toMatchObject({ content: 'A', state: 'complete', model: 'deepseek-chat' })
    expect(core.sessions.finalizeMessage(session.id, messageId, 'aborted')).toBeNull()
    core.sessions.applyDelta(session.id, messageId, 'B')

    const message = core.sessions.getSession(session.id).messages[1]
    expect(message).toMatchObject({ content: 'A', state: 'complete' })
    expect(frontend.types().filter((type) => type === 'turn_end')).toHaveLength(1)
  })

  it('出错时消息标记为 aborted，会话进入 error，之后可继续对话', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    core.sessions.applyDelta(session.id, messageId, 'half')
    core.sessions.finalizeMessage(session.id, messageId, 'error')

    const current = core.sessions.getSession(session.id)
    expect(current.status).toBe('error')
    expect(current.messages[1]).toMatchObject({ content: 'half', state: 'aborted' })

    core.sessions.appendUserMessage(session.id, 'retry')
    expect(core.sessions.getSession(session.id).status).toBe('idle')
  })

  it('空内容的中止回复不保存', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    expect(core.sessions.finalizeMessage(session.id, messageId, 'aborted')).toBeNull()

    expect(core.sessions.getSession(session.id).messages.map((m) => m.role)).toEqual(['user'])
    core.sessions.load()
    expect(core.sessions.getSession(session.id).messages.map((m) => m.role)).toEqual(['user'])
  })

  it('生成中不能清空消息，空闲时清空并保存', () => {
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'q')
    const messageId = core.sessions.beginAssistantMessage(session.id)
    expect(() => core.sessions.clearMessages(session.id)).toThrow(InvalidStateError)
    core.sessions.finalizeMessage(session.id, messageId, 'aborted')

    core.sessions.clearMessages(session.id)
    core.sessions.load()
    expect(core.sessions.getSession(session.id).messages).toEqual([])
  })

  it('删除单条消息', () => {
    const session = core.sessions.createSession()
    const first = core.sessions.appendUserMessage(session.id, 'first')
    core.sessions.appendUserMessage(session.id, 'second')
    core.sessions.deleteMessage(session.id, first)
    expect(() => core.sessions.deleteMessage(session.id, 'missing')).toThrow(NotFoundError)

    core.sessions.load()
    expect(core.sessions.getSession(session.id).messages.map((m) => m.content)).toEqual(['second'])
  })
})

describe('SessionService 一轮对话', () => {
  it('完整生成：保存回复并自动生成标题', async () => {
    adapter.script({ chunks: ['Hel', 'lo, ', 'world'] })
    const session = core.sessions.createSession()

    const result = await core.sessions.submit(session.id, 'hello')
    expect(result.outcome).toBe('complete')
    expect(result.message).toMatchObject({ role: 'assistant', content: 'Hello, world', state: 'complete' })
    expect(frontend.deltas()).toEqual(['Hel', 'lo, ', 'world'])

    const current = core.sessions.getSession(session.id)
    expect(current.status).toBe('idle')
    expect(current.title).toBe('测试标题')
    expect(current.titleSource).toBe('generated')

    core.sessions.load()
    const loaded = core.sessions.getSession(session.id)
    expect(loaded.messages.map((m) => [m.role, m.content, m.state])).toEqual([
      ['user', 'hello', 'complete'],
      ['assistant', 'Hello, world', 'complete']
    ])
    expect(loaded.title).toBe('测试标题')
  })

  it('请求包含系统提示和历史消息', async () => {
    adapter.script({ chunks: ['first reply'] }, { chunks: ['second reply'] })
    const session = core.sessions.createSession({ systemPrompt: '简洁回答' })

    await core.sessions.submit(session.id, 'one')
    await core.sessions.submit(session.id, 'two')

    expect(adapter.streamRequests[1]).toEqual({
      model: 'deepseek-chat',
      messages: [
        { role: 'system', content: '简洁回答' },
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'first reply' },
        { role: 'user', content: 'two' }
      ],
      temperature: 0.7,
      maxTokens: 2048
    })
    expect(adapter.titleRequests).toHaveLength(1)
  })

  it('事件顺序：turn_start → text_delta → turn_end → title_updated', async () => {
    adapter.script({ chunks: ['ok'] })
    const session = core.sessions.createSession()
    frontend.events.length = 0

    await core.sessions.submit(session.id, 'hi')
    expect(frontend.types()).toEqual(['turn_start', 'text_delta', 'turn_end', 'title_updated'])
  })

  it('生成中 submit 被拒绝', async () => {
    adapter.script({ chunks: ['a'], hang: true })
    const session = core.sessions.createSession()

    const pending = core.sessions.submit(session.id, 'hi')
    expect(core.sessions.getSession(session.id).status).toBe('awaiting_response')
    await expect(core.sessions.submit(session.id, 'again')).rejects.toBeInstanceOf(InvalidStateError)

    await vi.waitFor(() => expect(core.sessions.getSession(session.id).status).toBe('streaming'))
    expect(() => core.sessions.appendUserMessage(session.id, 'again')).toThrow(InvalidStateError)

    core.sessions.abort(session.id)
    expect((await pending).outcome).toBe('cancelled')
  })

  it('取消后保存已生成的部分内容', async () => {
    adapter.script({ chunks: ['部分', '回复'], hang: true })
    const session = core.sessions.createSession()

    const pending = core.sessions.submit(session.id, 'hi')
    await vi.waitFor(() => expect(frontend.deltas()).toEqual(['部分', '回复']))

    const aborted = core.sessions.abort(session.id)
    expect(aborted.aborted).toBe(true)
    expect(aborted.savedMessage).toMatchObject({ content: '部分回复', state: 'aborted' })
    expect(core.sessions.getSession(session.id).status).toBe('idle')

    const result = await pending
    expect(result).toMatchObject({ outcome: 'cancelled', text: '部分回复' })
    expect(result.message).toMatchObject({ content: '部分回复', state: 'aborted' })
    // 取消的回合不生成标题
    expect(adapter.titleRequests).toHaveLength(0)

    core.sessions.load()
    expect(core.sessions.getSession(session.id).messages[1]).toMatchObject({ content: '部分回复', state: 'aborted' })
  })

  it('没有进行中的生成时取消返回 false', () => {
    const session = core.sessions.createSession()
    expect(core.sessions.abort(session.id)).toEqual({ aborted: false, savedMessage: null })
  })

  it('出错时广播错误事件，空回复不保存', async () => {
    adapter.script({ fail: new ProviderError('模型不存在') })
    const session = core.sessions.createSession()

    const result = await core.sessions.submit(session.id, 'hi')
    expect(result.outcome).toBe('error')
    expect(result.message).toBeNull()
    expect(core.sessions.getSession(session.id).status).toBe('error')
    expect(core.sessions.getSession(session.id).messages.map((m) => m.role)).toEqual(['user'])
    expect(frontend.events).toContainEqual({
      type: 'error',
      sessionId: session.id,
      kind: 'provider',
      error: '模型不存在'
    })
  })

  it('未配置 API Key 时在请求前失败', async () => {
    core.config.removeApiKey('deepseek')
    const session = core.sessions.createSession()

    await expect(core.sessions.submit(session.id, 'hi')).rejects.toBeInstanceOf(ConfigError)
    expect(core.sessions.getSession(session.id).messages).toHaveLength(0)
    expect(adapter.streamRequests).toHaveLength(0)
  })

  it('删除生成中的会话：先取消，之后不再写入', async () => {
    adapter.script({ chunks: ['x'], hang: true })
    const session = core.sessions.createSession()

    const pending = core.sessions.submit(session.id, 'hi')
    await vi.waitFor(() => expect(frontend.deltas()).toEqual(['x']))
    core.sessions.deleteSession(session.id)

    const result = await pending
    expect(result.outcome).toBe('cancelled')
    expect(core.sessions.findSession(session.id)).toBeUndefined()
    expect(frontend.types().slice(-2)).toEqual(['turn_end', 'session_deleted'])

    core.sessions.load()
    expect(core.sessions.findSession(session.id)).toBeUndefined()
  })
  it('只发送系统提示和最近 maxContextMessages 条消息', async () => {
    core.config.update({ 'session.maxContextMessages': 2 })
    adapter.script({ chunks: ['first reply'] }, { chunks: ['second reply'] })
    const session = core.sessions.createSession({ systemPrompt: '简洁回答' })

    await core.sessions.submit(session.id, 'one')
    await core.sessions.submit(session.id, 'two')

    expect(adapter.streamRequests[1].messages).toEqual([
      { role: 'system', content: '简洁回答' },
      { role: 'assistant', content: 'first reply' },
      { role: 'user', content: 'two' }
    ])
    expect(() => core.config.update({ 'session.maxContextMessages': 0 })).toThrow(ConfigError)
  })
})

describe('SessionService 多会话并发', () => {
  it('一个会话完成、另一个仍在生成，取消互不影响', async () => {
    adapter.script({ chunks: ['慢'], hang: true }, { chunks: ['快', '答'] })
    const slow = core.sessions.createSession()
    const fast = core.sessions.createSession()

    const slowPending = core.sessions.submit(slow.id, 'slow question')
    await vi.waitFor(() => expect(frontend.deltas()).toEqual(['慢']))

    const fastResult = await core.sessions.submit(fast.id, 'fast question')
    expect(fastResult).toMatchObject({ outcome: 'complete', text: '快答' })
    expect(core.sessions.getSession(slow.id).status).toBe('streaming')
    expect(core.sessions.getSession(fast.id).status).toBe('idle')

    const fastEvents = frontend.events.filter((e) => e.sessionId === fast.id).length
    expect(core.sessions.abort(slow.id).aborted).toBe(true)
    expect((await slowPending).outcome).toBe('cancelled')

    expect(core.sessions.getSession(slow.id).messages.map((m) => [m.content, m.state])).toEqual([
      ['slow question', 'complete'],
      ['慢', 'aborted']
    ])
    const fastSession = core.sessions.getSession(fast.id)
    expect(fastSession.status).toBe('idle')
    expect(fastSession.title).toBe('测试标题')
    expect(fastSession.messages.map((m) => [m.content, m.state])).toEqual([
      ['fast question', 'complete'],
      ['快答', 'complete']
    ])
    expect(frontend.events.filter((e) => e.sessionId === fast.id)).toHaveLength(fastEvents)
    expect(core.sessions.abort(fast.id).aborted).toBe(false)
  })
})

describe('SessionService 标题生成', () => {
  it('用户在生成标题期间重命名，以用户标题为准', async () => {
    const gate = createDeferred<void>()
    adapter.titleGate = gate.promise
    adapter.script({ chunks: ['reply'] })
    const session = core.sessions.createSession()

    const pending = core.sessions.submit(session.id, 'hi')
    await vi.waitFor(() => expect(adapter.titleRequests).toHaveLength(1))
    core.sessions.renameSession(session.id, '我的标题')
    gate.resolve()
    await pending

    expect(core.sessions.getSession(session.id)).toMatchObject({ title: '我的标题', titleSource: 'user' })
  })

  it('模型生成标题失败时使用首条消息', async () => {
    adapter.titleReply = new ProviderError('x')
    adapter.script({ chunks: ['reply'] })
    const session = core.sessions.createSession()

    await core.sessions.submit(session.id, 'Explain   the\nborrow checker in Rust please')
    expect(core.sessions.getSession(session.id)).toMatchObject({
      title: 'Explain the borrow c…',
      titleSource: 'generated'
    })
  })

  it('关闭自动命名后保持占位标题', async () => {
    core.config.update({ 'session.autoRename': false })
    adapter.script({ chunks: ['reply'] })
    const session = core.sessions.createSession()

    await core.sessions.submit(session.id, 'hi')
    expect(core.sessions.getSession(session.id).title).toBe('新对话')
    expect(adapter.titleRequests).toHaveLength(0)
  })

  it('只在第一条回复后生成一次', async () => {
    adapter.script({ chunks: ['one'] }, { chunks: ['two'] })
    const session = core.sessions.createSession()
    await core.sessions.submit(session.id, 'first')
    core.sessions.renameSession(session.id, '手动')
    await core.sessions.submit(session.id, 'second')
    expect(adapter.titleRequests).toHaveLength(1)
    expect(core.sessions.getSession(session.id).title).toBe('手动')
  })
})

describe('SessionService 持久化失败', () => {
  it('写库失败不影响内存状态，下次写入时重试', () => {
    const session = core.sessions.createSession()
    vi.spyOn(StorageService.prototype, 'appendMessage').mockImplementationOnce(() => {
      throw new PersistenceError('磁盘已满')
    })

    core.sessions.appendUserMessage(session.id, 'first')
    expect(core.sessions.getSession(session.id).messages.map((m) => m.content)).toEqual(['first'])
    expect(frontend.events).toContainEqual({
      type: 'error',
      sessionId: session.id,
      kind: 'persistence',
      error: '磁盘已满'
    })

    core.sessions.appendUserMessage(session.id, 'second')
    core.sessions.load()
    expect(core.sessions.getSession(session.id).messages.map((m) => m.content)).toEqual(['first', 'second'])
  })

  it('重新开启自动保存后补写关闭期间的会话，之后的写入正常落库', () => {
    core.config.update({ 'session.autoSave': false })
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'first')

    core.config.update({ 'session.autoSave': true })
    core.sessions.appendUserMessage(session.id, 'second')
    core.sessions.renameSession(session.id, '补写')
    expect(frontend.types()).not.toContain('error')

    core.sessions.load()
    const loaded = core.sessions.getSession(session.id)
    expect(loaded.title).toBe('补写')
    expect(loaded.messages.map((m) => m.content)).toEqual(['first', 'second'])
  })

  it('关闭自动保存后不写库', () => {
    core.config.update({ 'session.autoSave': false })
    const session = core.sessions.createSession()
    core.sessions.appendUserMessage(session.id, 'ephemeral')

    core.sessions.load()
    expect(core.sessions.findSession(session.id)).toBeUndefined()
  })
})
