/**
 * 路径相关工具函数：所有数据文件的统一入口
 */

import { join } from 'path'
import { homedir } from 'os'
import { mkdirSync, existsSync } from 'fs'

/** 确保目录存在并返回路径 */
export function ensureDir(dir: string): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
  return dir
}

/** 默认数据目录：~/.parley/data/（可由 PARLEY_DATA_DIR 覆盖） */
export function getDefaultDataDir(): string {
  return process.env.PARLEY_DATA_DIR || join(homedir(), '.parley', 'data')
}

/** 数据库文件 */
export function getDatabasePath(dataDir: string): string {
  return join(dataDir, 'parley.db')
}

/** API Key 加密主密钥文件 */
export function getSecretKeyPath(dataDir: string): string {
  return join(dataDir, '.secret-key')
}
