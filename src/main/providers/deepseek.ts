import { OpenAICompatibleAdapter } from './openaiCompatible'

/**
 * DeepSeek 适配器
 * DeepSeek 不识别 store / developer 角色 / reasoning_effort，最大 token 字段为 max_tokens
 */
export class DeepSeekAdapter extends OpenAICompatibleAdapter {
  readonly name = 'deepseek'

  protected override compat() {
    return {
      supportsStore: false,
      supportsDeveloperRole: false,
      supportsReasoningEffort: false,
      maxTokensField: 'max_tokens' as const
    }
  }
}
