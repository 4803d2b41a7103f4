/**
 * DAO 层类型统一出口
 * 仅包含与数据库表直接对应的行类型
 */
export * from './session'
export * from './message'
export * from './provider'
export * from './settings'
