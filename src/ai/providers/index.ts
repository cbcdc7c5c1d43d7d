// src/ai/providers/index.ts
// Builds the zero-shot client named by AI_PROVIDER.

import type { AppConfig } from '../../config';
import type { ZeroShotClient } from '../types';
import { DevZeroShotClient } from './dev';
import { HuggingFaceZeroShotClient } from './huggingface';
import { OpenAIZeroShotClient } from './openai';
import { AnthropicZeroShotClient } from './anthropic';

export { DevZeroShotClient } from './dev';
export { HuggingFaceZeroShotClient } from './huggingface';
export { OpenAIZeroShotClient } from './openai';
export { AnthropicZeroShotClient } from './anthropic';

function requireSecret(value: string, envName: string, provider: string): string {
  if (!value) {
    throw new Error(`${envName} is not set. Set it in your environment to use the ${provider} provider.`);
  }
  return value;
}

export function createZeroShotClient(config: AppConfig): ZeroShotClient {
  const { ai } = config;

  switch (ai.provider) {
    case 'huggingface':
      return new HuggingFaceZeroShotClient({
        ...ai.huggingface,
        token: requireSecret(ai.huggingface.token, 'HF_API_TOKEN', 'huggingface'),
      });
    case 'openai':
      return new OpenAIZeroShotClient({
        ...ai.openai,
        apiKey: requireSecret(ai.openai.apiKey, 'OPENAI_API_KEY', 'openai'),
      });
    case 'anthropic':
      return new AnthropicZeroShotClient({
        ...ai.anthropic,
        apiKey: requireSecret(ai.anthropic.apiKey, 'ANTHROPIC_API_KEY', 'anthropic'),
      });
    case 'dev':
      return new DevZeroShotClient(config.classifier.labels);
  }
}
