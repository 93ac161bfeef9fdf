// Generative model backed by the Anthropic SDK
// The SDK is lazy-loaded so index-only tooling never pulls it in

import type Anthropic from '@anthropic-ai/sdk';
import type { Settings } from '../config/settings.js';

export interface GenerateOptions {
  temperature: number;
  maxTokens: number;
}

/** Text-in/text-out completion; all prompts in the pipeline go through this */
export interface GenerativeModel {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export class AnthropicModel implements GenerativeModel {
  private clientPromise: Promise<Anthropic> | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model = 'claude-haiku-4-5-20251001',
  ) {}

  static fromSettings(settings: Settings): AnthropicModel {
    return new AnthropicModel(settings.anthropicApiKey, settings.model);
  }

  private getClient(): Promise<Anthropic> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      return Promise.reject(new Error('ANTHROPIC_API_KEY environment variable is not set'));
    }
    if (!this.clientPromise) {
      this.clientPromise = import('@anthropic-ai/sdk').then(mod => new mod.default({ apiKey }));
    }
    return this.clientPromise;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const client = await this.getClient();
    const response = await client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim();
  }
}
