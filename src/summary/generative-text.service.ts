import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { GenerativeServiceError, errorMessage } from '../common/errors';

@Injectable()
export class GenerativeTextService {
  private readonly log = new Logger(GenerativeTextService.name);
  private client: OpenAI | null = null;
  private model: string;

  constructor(cfg: ConfigService) {
    const apiKey = cfg.get<string>('OPENAI_API_KEY');
    this.model = cfg.get<string>('GENERATIVE_MODEL') || 'gpt-4o-mini';

    if (apiKey) {
      // single-shot: callers decide what a failure means
      this.client = new OpenAI({
        apiKey,
        baseURL: cfg.get<string>('GENERATIVE_BASE_URL') || undefined,
        maxRetries: 0,
      });
    } else {
      this.log.warn('⚠️ OPENAI_API_KEY not configured, generative features disabled');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(prompt: string): Promise<string> {
    if (!this.client) {
      throw new GenerativeServiceError('Generative text service is not configured');
    }

    const startTime = Date.now();
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.3,
      });

      const text = response.choices[0]?.message?.content?.trim();
      if (!text) {
        throw new GenerativeServiceError('Generative service returned no text');
      }

      this.log.log(
        `✅ ${this.model} answered ${text.length} chars in ${Date.now() - startTime}ms`,
      );
      return text;
    } catch (error) {
      if (error instanceof GenerativeServiceError) throw error;
      const status = error instanceof OpenAI.APIError ? ` (${error.status ?? 'no status'})` : '';
      throw new GenerativeServiceError(
        `Generative service failed${status}: ${errorMessage(error)}`,
        error,
      );
    }
  }
}
