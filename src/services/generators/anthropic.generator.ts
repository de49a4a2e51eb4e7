import { Injectable } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { GeneratorRequest, QuestionGenerator } from '../../interfaces';
import { AiConfig, getAppConfig } from '../../config/app.config';
import { buildGenerationPrompt, parseQuestionPayload, SYSTEM_PROMPT } from './generation-prompt';

@Injectable()
export class AnthropicQuestionGenerator implements QuestionGenerator {
  readonly name = 'anthropic';
  private anthropic: Anthropic | null = null;
  private readonly model: string;

  constructor(config?: AiConfig, client?: Anthropic) {
    const ai = config || getAppConfig().ai;
    this.model = ai.anthropicModel;
    if (client) {
      this.anthropic = client;
    } else if (ai.anthropicApiKey) {
      this.anthropic = new Anthropic({ apiKey: ai.anthropicApiKey, maxRetries: 1 });
    }
  }

  isAvailable(): boolean {
    return this.anthropic !== null;
  }

  async generate(request: GeneratorRequest): Promise<unknown[]> {
    if (!this.anthropic) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }

    const response = await this.anthropic.messages.create(
      {
        model: this.model,
        max_tokens: 4096,
        system: SYSTEM_PROMPT,
        messages: [
          {
            role: 'user',
            content: `${buildGenerationPrompt(request)}\n\nReturn ONLY a valid JSON object and no markdown.`,
          },
        ],
      },
      { signal: request.signal },
    );

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map(block => block.text)
      .join('');

    if (!text) {
      throw new Error('Anthropic returned empty content');
    }
    return parseQuestionPayload(text);
  }
}
