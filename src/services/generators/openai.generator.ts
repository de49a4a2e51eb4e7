import { Injectable } from '@nestjs/common';
import OpenAI from 'openai';
import { GeneratorRequest, QuestionGenerator } from '../../interfaces';
import { AiConfig, getAppConfig } from '../../config/app.config';
import { buildGenerationPrompt, parseQuestionPayload, SYSTEM_PROMPT } from './generation-prompt';

@Injectable()
export class OpenAIQuestionGenerator implements QuestionGenerator {
  readonly name = 'openai';
  private client: OpenAI | null = null;
  private readonly model: string;

  constructor(config?: AiConfig, client?: OpenAI) {
    const ai = config || getAppConfig().ai;
    this.model = ai.openaiModel;
    if (client) {
      this.client = client;
    } else if (ai.openaiApiKey) {
      this.client = new OpenAI({ apiKey: ai.openaiApiKey, maxRetries: 1 });
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(request: GeneratorRequest): Promise<unknown[]> {
    if (!this.client) {
      throw new Error('OPENAI_API_KEY not configured');
    }

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildGenerationPrompt(request) },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.7,
      },
      { signal: request.signal },
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty content');
    }
    return parseQuestionPayload(content);
  }
}
