import { Type, type Static, type TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { SettingsDao } from '../dao/settingsDao'
import type { ProviderDao } from '../dao/providerDao'
import type { AppConfig, ProviderConfig, ProviderName } from '../types'
import { PROVIDER_NAMES } from '../types'
import { BUILTIN_PROVIDERS } from '../providers/catalog'
import { ConfigError } from '../errors'
import { t } from '../i18n'
import { createLogger, maskSecret } from '../logger'

const log = createLogger('Config')

// ---------- 设置元数据注册表 ----------

export interface SettingMeta {
  schema: TSchema
  /** 可读描述（日志 / 设置页提示） */
  desc: string
}

/**
 * 所有已知设置的注册表
 * 新增设置时在此追加一行，并在 DEFAULT_CONFIG / buildSnapshot 中补充默认值
 */
export const KNOWN_SETTINGS = {
  'general.defaultProvider': {
    schema: Type.Union([Type.Literal('deepseek'), Type.Literal('openrouter')]),
    desc: 'deepseek | openrouter'
  },
  'general.language': {
    schema: Type.Union([Type.Literal('zh'), Type.Literal('en')]),
    desc: 'zh | en'
  },
  'generation.temperature': {
    schema: Type.Number({ minimum: 0, maximum: 2 }),
    desc: 'number, 0-2'
  },
  'generation.maxTokens': {
    schema: Type.Integer({ minimum: 1, maximum: 131072 }),
    desc: 'integer, max output tokens'
  },
  'generation.stream': { schema: Type.Boolean(), desc: 'true | false' },
  'session.autoSave': { schema: Type.Boolean(), desc: 'true | false, false = nothing is written to disk' },
  'session.autoRename': { schema: Type.Boolean(), desc: 'true | false, generate a title after the first reply' },
  'session.maxContextMessages': {
    schema: Type.Integer({ minimum: 1, maximum: 1000 }),
    desc: 'integer, recent messages sent as context'
  },
  'request.timeoutMs': {
    schema: Type.Integer({ minimum: 1000 }),
    desc: 'integer ms, inactivity timeout per request'
  },
  'request.maxRetries': { schema: Type.Integer({ minimum: 0, maximum: 10 }), desc: 'integer, 0-10' },
  'request.retryBaseDelayMs': { schema: Type.Integer({ minimum: 0 }), desc: 'integer ms, backoff base' }
} satisfies Record<string, SettingMeta>

export type SettingKey = keyof typeof KNOWN_SETTINGS
export type SettingValue<K extends SettingKey> = Static<(typeof KNOWN_SETTINGS)[K]['schema']>
export type SettingsPatch = { [K in SettingKey]?: SettingValue<K> }

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(KNOWN_SETTINGS, key)
}

/** 默认配置 */
export const DEFAULT_CONFIG: AppConfig = {
  general: { defaultProvider: 'deepseek', language: 'zh' },
  generation: { temperature: 0.7, maxTokens: 2048, stream: true },
  session: { autoSave: true, autoRename: true, maxContextMessages: 20 },
  request: { timeoutMs: 60_000, maxRetries: 2, retryBaseDelayMs: 1000 }
}

/** 配置变更监听 */
export type ConfigListener = (config: AppConfig, changedKeys: SettingKey[]) => void

/** 提供商端点修改参数 */
export interface ProviderEndpointPatch {
  baseUrl?: string
  defaultModel?: string
}

// ---------- 配置服务 ----------

/**
 * 配置服务：设置项 + 提供商凭据
 * 启动时加载一次，对外暴露只读快照；修改立即落库并通知监听者
 */
export class ConfigService {
  private snapshot: AppConfig = DEFAULT_CONFIG
  private listeners = new Set<ConfigListener>()

  constructor(
    private readonly settingsDao: SettingsDao,
    private readonly providerDao: ProviderDao
  ) {}

  /** 从数据库加载配置（缺失或非法的值回退默认值） */
  load(): AppConfig {
    this.snapshot = this.buildSnapshot(this.settingsDao.findAll())
    log.info(`配置已加载: ${this.describe()}`)
    return this.snapshot
  }

  /** 当前配置快照 */
  get(): AppConfig {
    return this.snapshot
  }

  /** 修改设置：整体校验通过后才落库 */
  update(patch: SettingsPatch): AppConfig {
    const entries: Array<[SettingKey, unknown]> = []
    for (const [key, value] of Object.entries(patch)) {
      if (!isSettingKey(key)) {
        throw new ConfigError(t('errors.unknownSetting', { key }))
      }
      if (value === undefined) continue
      const schema: TSchema = KNOWN_SETTINGS[key].schema
      if (!Value.Check(schema, value)) {
        throw new ConfigError(t('errors.invalidSetting', { key }))
      }
      entries.push([key, value])
    }
    if (entries.length === 0) return this.snapshot

    for (const [key, value] of entries) {
      this.settingsDao.upsert(key, JSON.stringify(value))
    }
    this.snapshot = this.buildSnapshot(this.settingsDao.findAll())
    log.info(`设置已更新: ${entries.map(([key]) => key).join(', ')}`)
    this.notify(entries.map(([key]) => key))
    return this.snapshot
  }

  /** 恢复某个设置的默认值 */
  reset(key: SettingKey): AppConfig {
    this.settingsDao.delete(key)
    this.snapshot = this.buildSnapshot(this.settingsDao.findAll())
    this.notify([key])
    return this.snapshot
  }

  /** 订阅配置变更，返回取消订阅函数 */
  onChange(listener: ConfigListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---------- 提供商凭据 ----------

  /** 保存 API Key（加密落库） */
  setApiKey(provider: ProviderName, apiKey: string): void {
    this.providerDao.updateApiKey(provider, apiKey.trim())
    log.info(`API Key 已更新 provider=${provider} key=${maskSecret(apiKey.trim())}`)
  }

  /** 移除 API Key */
  removeApiKey(provider: ProviderName): void {
    this.providerDao.updateApiKey(provider, '')
    log.info(`API Key 已移除 provider=${provider}`)
  }

  /** 修改提供商 Base URL / 默认模型 */
  updateProvider(provider: ProviderName, patch: ProviderEndpointPatch): ProviderConfig {
    const current = this.getProviderConfig(provider)
    const baseUrl = patch.baseUrl?.trim() || current.baseUrl
    const defaultModel = patch.defaultModel?.trim() || current.defaultModel
    this.providerDao.updateEndpoint(provider, baseUrl, defaultModel)
    return this.getProviderConfig(provider)
  }

  /** 是否已配置 API Key */
  hasApiKey(provider: ProviderName): boolean {
    return this.getProviderConfig(provider).apiKey !== ''
  }

  /** 组装提供商配置（生成参数取全局设置） */
  getProviderConfig(provider: ProviderName): ProviderConfig {
    const preset = BUILTIN_PROVIDERS[provider]
    const row = this.providerDao.findByName(provider)
    return {
      name: provider,
      baseUrl: row?.baseUrl || preset.baseUrl,
      apiKey: row?.apiKey ?? '',
      defaultModel: row?.defaultModel || preset.defaultModel,
      generation: { ...this.snapshot.generation }
    }
  }

  /** 已配置 API Key 的提供商 */
  configuredProviders(): ProviderName[] {
    return PROVIDER_NAMES.filter((name) => this.hasApiKey(name))
  }

  /** 配置摘要（日志用，密钥遮蔽） */
  describe(): string {
    const { general, generation, session, request } = this.snapshot
    const keys = PROVIDER_NAMES.map((name) => `${name}=${maskSecret(this.getProviderConfig(name).apiKey)}`)
    return [
      `provider=${general.defaultProvider}`,
      `lang=${general.language}`,
      `temperature=${generation.temperature}`,
      `maxTokens=${generation.maxTokens}`,
      `stream=${generation.stream}`,
      `autoSave=${session.autoSave}`,
      `autoRename=${session.autoRename}`,
      `context=${session.maxContextMessages}`,
      `timeout=${request.timeoutMs}`,
      `retries=${request.maxRetries}`,
      ...keys
    ].join(' ')
  }

  private notify(changedKeys: SettingKey[]): void {
    for (const listener of this.listeners) {
      try {
        listener(this.snapshot, changedKeys)
      } catch (err) {
        log.warn(`配置监听器执行失败: ${err}`)
      }
    }
  }

  private buildSnapshot(raw: Record<string, string>): AppConfig {
    const read = <K extends SettingKey>(key: K, fallback: SettingValue<K>): SettingValue<K> =>
      readSetting(raw, key, fallback)
    return {
      general: {
        defaultProvider: read('general.defaultProvider', DEFAULT_CONFIG.general.defaultProvider),
        language: read('general.language', 'zh')
      },
      generation: {
        temperature: read('generation.temperature', DEFAULT_CONFIG.generation.temperature),
        maxTokens: read('generation.maxTokens', DEFAULT_CONFIG.generation.maxTokens),
        stream: read('generation.stream', DEFAULT_CONFIG.generation.stream)
      },
      session: {
        autoSave: read('session.autoSave', DEFAULT_CONFIG.session.autoSave),
        autoRename: read('session.autoRename', DEFAULT_CONFIG.session.autoRename),
        maxContextMessages: read('session.maxContextMessages', DEFAULT_CONFIG.session.maxContextMessages)
      },
      request: {
        timeoutMs: read('request.timeoutMs', DEFAULT_CONFIG.request.timeoutMs),
        maxRetries: read('request.maxRetries', DEFAULT_CONFIG.request.maxRetries),
        retryBaseDelayMs: read('request.retryBaseDelayMs', DEFAULT_CONFIG.request.retryBaseDelayMs)
      }
    }
  }
}

/** 读取单个设置：JSON 解析 + schema 校验，失败回退默认值 */
function readSetting<K extends SettingKey>(
  raw: Record<string, string>,
  key: K,
  fallback: SettingValue<K>
): SettingValue<K> {
  const text = raw[key]
  if (text === undefined) return fallback
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    log.warn(`设置值不是合法 JSON，使用默认值: ${key}`)
    return fallback
  }
  if (Value.Check(KNOWN_SETTINGS[key].schema, parsed)) return parsed
  log.warn(`设置值无效，使用默认值: ${key}`)
  return fallback
}
