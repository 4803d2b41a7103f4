import { BaseDao } from './database'
import type { DatabaseManager } from './database'
import type { SecretBox } from '../services/crypto'
import type { ProviderRow } from './types'
import { createLogger } from '../logger'

const log = createLogger('ProviderDao')

/**
 * Provider DAO：提供商表的纯数据访问操作
 * apiKey 写入前加密，读出后解密
 */
export class ProviderDao extends BaseDao {
  constructor(
    databaseManager: DatabaseManager,
    private readonly secrets: SecretBox
  ) {
    super(databaseManager)
  }

  /** 根据名称获取提供商 */
  findByName(name: string): ProviderRow | undefined {
    const row = this.db.prepare<[string], ProviderRow>('SELECT * FROM providers WHERE name = ?').get(name)
    return row ? this.decryptRow(row) : undefined
  }

  /** 更新提供商 API Key（空字符串表示移除） */
  updateApiKey(name: string, apiKey: string): void {
    this.db
      .prepare<[string, number, string]>('UPDATE providers SET apiKey = ?, updatedAt = ? WHERE name = ?')
      .run(this.secrets.encrypt(apiKey), Date.now(), name)
  }

  /** 更新提供商 Base URL / 默认模型 */
  updateEndpoint(name: string, baseUrl: string, defaultModel: string): void {
    this.db
      .prepare<[string, string, number, string]>(
        'UPDATE providers SET baseUrl = ?, defaultModel = ?, updatedAt = ? WHERE name = ?'
      )
      .run(baseUrl, defaultModel, Date.now(), name)
  }

  private decryptRow(row: ProviderRow): ProviderRow {
    try {
      return { ...row, apiKey: this.secrets.decrypt(row.apiKey) }
    } catch (err) {
      // 密钥文件丢失或被替换：视为未配置，等待用户重新填写
      log.warn(`解密 API Key 失败 provider=${row.name}: ${err}`)
      return { ...row, apiKey: '' }
    }
  }
}
