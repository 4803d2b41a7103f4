import { DatabaseManager, IN_MEMORY } from './dao/database'
import { SettingsDao } from './dao/settingsDao'
import { ProviderDao } from './dao/providerDao'
import { SecretBox } from './services/crypto'
import { ConfigService } from './services/configService'
import { StorageService } from './services/storage'
import { StreamOrchestrator, type SleepFn } from './services/streamOrchestrator'
import { TitleService } from './services/titleService'
import { SessionService } from './services/sessionService'
import { ExportService } from './services/exportService'
import { createProviderAdapter, type AdapterFactory, type AdapterResolver, type StreamFn } from './providers'
import { ChatFrontendRegistry } from './frontend/core/ChatFrontendRegistry'
import { DefaultChatGateway } from './frontend/core/DefaultChatGateway'
import { createStartupContext, operationContext } from './frontend/core/OperationContext'
import { changeLanguage } from './i18n'
import { createLogger } from './logger'
import { mark, measure } from './perf'
import { ensureDir, getDatabasePath, getDefaultDataDir, getSecretKeyPath } from './utils/paths'

const log = createLogger('App')

export interface ChatCoreOptions {
  /** 数据目录（数据库 + 密钥文件），默认 ~/.parley/data */
  dataDir?: string
  /** 使用内存数据库（测试） */
  inMemory?: boolean
  /** 替换 pi-ai 的流式函数 */
  streamFn?: StreamFn
  /** 替换适配器构造（优先于 streamFn） */
  adapterFactory?: AdapterFactory
  /** 替换重试退避等待 */
  sleep?: SleepFn
}

export interface ChatCore {
  gateway: DefaultChatGateway
  frontends: ChatFrontendRegistry
  config: ConfigService
  sessions: SessionService
  exporter: ExportService
  /** 取消所有生成、重试待写入数据并关闭数据库 */
  close(): void
}

/**
 * 组装会话核心
 * 打开数据库 → 加载配置 → 加载会话（无会话时创建默认会话）
 */
export function createChatCore(options: ChatCoreOptions = {}): ChatCore {
  return operationContext.run(createStartupContext(), () => {
    const dataDir = ensureDir(options.dataDir ?? getDefaultDataDir())
    const databaseManager = measure('openDatabase', () =>
      new DatabaseManager(options.inMemory ? IN_MEMORY : getDatabasePath(dataDir))
    )
    const secrets = new SecretBox(getSecretKeyPath(dataDir))

    const config = new ConfigService(new SettingsDao(databaseManager), new ProviderDao(databaseManager, secrets))
    const appConfig = config.load()
    changeLanguage(appConfig.general.language)
    config.onChange((next, changedKeys) => {
      if (changedKeys.includes('general.language')) changeLanguage(next.general.language)
    })

    const factory: AdapterFactory = options.adapterFactory ?? ((providerConfig) => createProviderAdapter(providerConfig, options.streamFn))
    const adapters: AdapterResolver = (provider) => factory(config.getProviderConfig(provider))

    const orchestrator = new StreamOrchestrator({
      policy: () => {
        const { request } = config.get()
        return { maxRetries: request.maxRetries, baseDelayMs: request.retryBaseDelayMs, timeoutMs: request.timeoutMs }
      },
      sleep: options.sleep
    })

    const frontends = new ChatFrontendRegistry()
    const sessions = new SessionService({
      storage: new StorageService(databaseManager, () => config.get().general.defaultProvider),
      config,
      orchestrator,
      adapters,
      frontends,
      titles: new TitleService(config, adapters)
    })
    config.onChange((next, changedKeys) => {
      // 关闭期间只改内存，重新开启时整体补写
      if (changedKeys.includes('session.autoSave') && next.session.autoSave) sessions.persistAll()
    })
    measure('loadSessions', () => sessions.load())
    sessions.ensureDefaultSession()

    const exporter = new ExportService(sessions)
    const gateway = new DefaultChatGateway(sessions, exporter, config)
    mark('chat core ready')

    return {
      gateway,
      frontends,
      config,
      sessions,
      exporter,
      close: () => {
        const aborted = sessions.abortAll()
        const failed = sessions.flushPendingWrites()
        if (failed > 0) log.warn(`退出时仍有 ${failed} 个会话的数据未能保存`)
        databaseManager.close()
        log.info(`会话核心已关闭 aborted=${aborted}`)
      }
    }
  })
}

export * from './errors'
export * from './types'
export * from './frontend/core'
export type { SubmitResult, AbortResult, ImportedSession } from './services/sessionService'
export type { ExportOptions } from './services/exportService'
export { renderSessionMarkdown, parseSessionMarkdown } from './services/exportService'
export type { SettingKey, SettingsPatch } from './services/configService'
export type { ProviderAdapter, StreamFn, AdapterFactory } from './providers'
export { BUILTIN_PROVIDERS } from './providers'
