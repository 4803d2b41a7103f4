/** 提供商行（对应 DB 表 providers），apiKey 为密文 */
export interface ProviderRow {
  name: string
  apiKey: string
  baseUrl: string
  defaultModel: string
  updatedAt: number
}
