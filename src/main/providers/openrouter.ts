import { OpenAICompatibleAdapter } from './openaiCompatible'

/** 应用名（OpenRouter 排行榜展示） */
const APP_TITLE = 'Parley'

/** OpenRouter 适配器 */
export class OpenRouterAdapter extends OpenAICompatibleAdapter {
  readonly name = 'openrouter'

  protected override headers(): Record<string, string> {
    return { 'X-Title': APP_TITLE }
  }
}
