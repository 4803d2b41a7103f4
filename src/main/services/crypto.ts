import { randomBytes, createCipheriv, createDecipheriv } from 'crypto'
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'

const ALGORITHM = 'aes-256-gcm'
const IV_LENGTH = 12
const KEY_LENGTH = 32
const AUTH_TAG_LENGTH = 16
const PREFIX = '$PARLEY_ENC$v1$'

/**
 * API Key 加解密（AES-256-GCM）
 * 主密钥保存在数据目录下的独立文件中，首次使用时生成
 */
export class SecretBox {
  private cachedKey: Buffer | null = null

  constructor(private readonly keyPath: string) {}

  private getOrCreateKey(): Buffer {
    if (this.cachedKey) return this.cachedKey

    if (existsSync(this.keyPath)) {
      const key = readFileSync(this.keyPath)
      if (key.length !== KEY_LENGTH) {
        throw new Error('Invalid encryption key file')
      }
      this.cachedKey = key
      return key
    }

    const dir = dirname(this.keyPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    const key = randomBytes(KEY_LENGTH)
    writeFileSync(this.keyPath, key, { mode: 0o600 })
    this.cachedKey = key
    return key
  }

  encrypt(plaintext: string): string {
    if (!plaintext) return plaintext
    if (plaintext.startsWith(PREFIX)) return plaintext

    const key = this.getOrCreateKey()
    const iv = randomBytes(IV_LENGTH)
    const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH })

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    const authTag = cipher.getAuthTag()

    return `${PREFIX}${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted.toString('hex')}`
  }

  decrypt(ciphertext: string): string {
    if (!ciphertext) return ciphertext
    if (!ciphertext.startsWith(PREFIX)) return ciphertext

    const [ivHex, authTagHex, dataHex] = ciphertext.slice(PREFIX.length).split(':')
    if (ivHex === undefined || authTagHex === undefined || dataHex === undefined) {
      throw new Error('Malformed encrypted value')
    }

    const key = this.getOrCreateKey()
    const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'), {
      authTagLength: AUTH_TAG_LENGTH
    })
    decipher.setAuthTag(Buffer.from(authTagHex, 'hex'))

    return Buffer.concat([decipher.update(Buffer.from(dataHex, 'hex')), decipher.final()]).toString('utf8')
  }
}
