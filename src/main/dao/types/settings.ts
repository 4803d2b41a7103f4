/** 设置行（对应 DB 表 settings），value 为 JSON 文本 */
export interface SettingsRow {
  key: string
  value: string
}
