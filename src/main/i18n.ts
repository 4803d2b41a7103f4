/**
 * 主进程 i18n 初始化
 * 使用 i18next（纯 Node.js），资源内联，初始化为同步完成
 */

import i18next from 'i18next'
import zh from '../shared/i18n/locales/zh.json'
import en from '../shared/i18n/locales/en.json'

/** 支持的语言列表 */
export const SUPPORTED_LANGUAGES = ['zh', 'en'] as const
export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number]

/** 将 locale 映射到支持的语言（如 zh-CN → zh、en-US → en），未知语言回退 zh */
export function resolveLanguage(locale: string): SupportedLanguage {
  const lang = locale.split('-')[0].toLowerCase()
  return SUPPORTED_LANGUAGES.find((l) => l === lang) ?? 'zh'
}

const i18n = i18next.createInstance()

void i18n.init({
  lng: 'zh',
  fallbackLng: 'en',
  initImmediate: false,
  interpolation: { escapeValue: false },
  resources: {
    zh: { translation: zh },
    en: { translation: en }
  }
})

/** 切换语言（配置变更时调用） */
export function changeLanguage(lang: string): void {
  void i18n.changeLanguage(resolveLanguage(lang))
}

/** 当前语言 */
export function currentLanguage(): SupportedLanguage {
  return resolveLanguage(i18n.language)
}

/** 某个 key 在所有语言下的译文（解析导出文件时识别任意语言的标签） */
export function translationsOf(key: string): string[] {
  return SUPPORTED_LANGUAGES.map((lng) => i18n.getFixedT(lng)(key))
}

/** 翻译函数（后端模块直接使用） */
export const t = i18n.t.bind(i18n)
