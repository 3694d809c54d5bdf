import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { carriesFailureMarker, isFailureOnly } from '../transcript/stitcher';
import { GenerativeTextService } from './generative-text.service';
import {
  customSummaryPrompt,
  defaultSummaryPrompt,
  improvePrompt,
} from './prompts';

export interface RefinedText {
  text: string;
  // false when refinement was skipped or failed and `text` is the input
  improved: boolean;
}

export interface SummaryDraft {
  text: string;
  customInstruction: boolean;
  // false when the input was passed through untouched
  generated: boolean;
}

@Injectable()
export class RefinementService {
  private readonly log = new Logger(RefinementService.name);

  constructor(private generative: GenerativeTextService) {}

  private unavailable(text: string): string | null {
    if (!text.trim()) return 'empty text';
    if (!this.generative.isAvailable()) return 'generative service unavailable';
    return null;
  }

  /**
   * Best effort: any failure hands back the original text. Transcripts with a
   * failure marker in any segment are left alone so the marker survives.
   */
  async improve(text: string): Promise<RefinedText> {
    const skip = carriesFailureMarker(text)
      ? 'transcript carries a failure marker'
      : this.unavailable(text);
    if (skip) {
      this.log.log(`⏭️ Skipping improve: ${skip}`);
      return { text, improved: false };
    }

    try {
      this.log.log(`🤖 Improving transcript (${text.length} chars)`);
      const improved = await this.generative.generate(improvePrompt(text));
      return { text: improved, improved: true };
    } catch (error) {
      this.log.warn(`⚠️ Improve failed, keeping original text: ${errorMessage(error)}`);
      return { text, improved: false };
    }
  }

  /**
   * Generative errors propagate: a summary is something the user asked for
   * and there is no sensible fallback text.
   */
  async summarize(text: string, instruction?: string): Promise<SummaryDraft> {
    const custom = instruction?.trim() ? instruction : '';
    const skip =
      this.unavailable(text) ??
      (isFailureOnly(text) ? 'no segment was recognized' : null);
    if (skip) {
      this.log.log(`⏭️ Skipping summary: ${skip}`);
      return { text, customInstruction: custom.length > 0, generated: false };
    }

    const prompt = custom
      ? customSummaryPrompt(text, custom)
      : defaultSummaryPrompt(text);

    this.log.log(
      `📝 Summarizing transcript (${text.length} chars, ${custom ? 'custom' : 'default'} instruction)`,
    );
    const summary = await this.generative.generate(prompt);
    return { text: summary, customInstruction: custom.length > 0, generated: true };
  }
}
