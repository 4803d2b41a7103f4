/**
 * 业务类型统一出口
 */
export * from './session'
export * from './message'
export * from './provider'
export * from './settings'
