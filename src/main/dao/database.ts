import Database from 'better-sqlite3'
import { dirname } from 'path'
import { existsSync, mkdirSync } from 'fs'
import { BUILTIN_PROVIDERS } from '../providers/catalog'
import { createLogger } from '../logger'

const log = createLogger('Database')

/** 内存数据库路径（测试使用） */
export const IN_MEMORY = ':memory:'

/**
 * 数据库连接管理
 * 负责 SQLite 连接初始化和表结构创建
 */
export class DatabaseManager {
  private db: Database.Database

  constructor(dbPath: string) {
    // 确保数据目录存在
    if (dbPath !== IN_MEMORY) {
      const dbDir = dirname(dbPath)
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true })
      }
    }

    this.db = new Database(dbPath)

    // 启用 WAL 模式，提升并发性能
    this.db.pragma('journal_mode = WAL')
    // 删除会话时级联删除消息
    this.db.pragma('foreign_keys = ON')

    this.initTables()
    log.info(`数据库已打开: ${dbPath}`)
  }

  /** 初始化数据库表 */
  private initTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        titleSource TEXT NOT NULL DEFAULT 'default',
        provider TEXT NOT NULL DEFAULT '',
        model TEXT NOT NULL DEFAULT '',
        systemPrompt TEXT NOT NULL DEFAULT '',
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        sessionId TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        model TEXT NOT NULL DEFAULT '',
        createdAt INTEGER NOT NULL,
        FOREIGN KEY (sessionId) REFERENCES sessions(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS providers (
        name TEXT PRIMARY KEY,
        apiKey TEXT NOT NULL DEFAULT '',
        baseUrl TEXT NOT NULL DEFAULT '',
        defaultModel TEXT NOT NULL DEFAULT '',
        updatedAt INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(sessionId, createdAt);
    `)

    // 迁移：messages 表增加 state 列（记录被中止的回复）
    this.migrateMessagesStateColumn()

    // 种子数据：内置提供商
    this.seedProviders()
  }

  /** 迁移：messages 表增加 state 列 */
  private migrateMessagesStateColumn(): void {
    const columns = this.db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('messages')")
      .all()
    const hasState = columns.some((c) => c.name === 'state')
    if (hasState) return

    this.db.exec(`ALTER TABLE messages ADD COLUMN state TEXT NOT NULL DEFAULT 'complete';`)
  }

  /** 种子数据：预置提供商（已存在的不覆盖） */
  private seedProviders(): void {
    const now = Date.now()
    const insertProvider = this.db.prepare<[string, string, string, number]>(
      'INSERT OR IGNORE INTO providers (name, apiKey, baseUrl, defaultModel, updatedAt) VALUES (?, \'\', ?, ?, ?)'
    )
    const seedAll = this.db.transaction(() => {
      for (const p of Object.values(BUILTIN_PROVIDERS)) {
        insertProvider.run(p.name, p.baseUrl, p.defaultModel, now)
      }
    })
    seedAll()
  }

  /** 获取数据库连接实例 */
  getDb(): Database.Database {
    return this.db
  }

  /** 在一个事务中执行 */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  /** 关闭数据库连接 */
  close(): void {
    if (this.db.open) this.db.close()
  }
}

/**
 * DAO 基类：持有连接管理器
 */
export abstract class BaseDao {
  constructor(protected readonly databaseManager: DatabaseManager) {}

  protected get db(): Database.Database {
    return this.databaseManager.getDb()
  }
}
