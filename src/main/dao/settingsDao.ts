import { BaseDao } from './database'
import type { SettingsRow } from './types'

/**
 * Settings DAO：设置表的纯数据访问操作
 */
export class SettingsDao extends BaseDao {
  /** 根据 key 获取设置值 */
  findByKey(key: string): string | undefined {
    return this.db.prepare<[string], SettingsRow>('SELECT * FROM settings WHERE key = ?').get(key)?.value
  }

  /** 获取所有设置，返回 key-value 映射 */
  findAll(): Record<string, string> {
    const rows = this.db.prepare<[], SettingsRow>('SELECT * FROM settings').all()
    const result: Record<string, string> = {}
    for (const row of rows) {
      result[row.key] = row.value
    }
    return result
  }

  /** 插入或更新设置 */
  upsert(key: string, value: string): void {
    this.db.prepare<[string, string]>('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run(key, value)
  }

  /** 删除设置（恢复默认值） */
  delete(key: string): void {
    this.db.prepare<[string]>('DELETE FROM settings WHERE key = ?').run(key)
  }
}
