import OpenAI from 'openai';

import { appConfig, requireConfigValue } from '../config.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature?: number;
}

/** The one capability plan generation needs from a hosted model. */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAITextGeneratorOptions {
  apiKey?: string;
  model?: string;
  client?: OpenAI;
}

export class OpenAITextGenerator implements TextGenerator {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAITextGeneratorOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey ?? requireConfigValue('openaiApiKey') });
    this.model = options.model ?? appConfig.openaiModel;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt }
      ],
      temperature: request.temperature ?? 0.7,
      response_format: { type: 'json_object' }
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Text generation returned an empty response');
    }
    return content;
  }
}
