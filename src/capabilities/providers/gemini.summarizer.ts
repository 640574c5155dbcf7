import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import { z } from 'zod';
import { CapabilityError, ThrottledError } from '../../common/errors';
import type { ExecutionSettings } from '../../config/execution.settings';
import {
  ContactProfile,
  Message,
  PageContent,
  Summarizer,
  Summary,
  TokenUsage,
} from '../interfaces/capabilities.interface';

const PROVIDER = 'gemini';
// rough upper bound for English prose
const CHARS_PER_TOKEN = 4;

const SummarySchema = z.object({ abstract: z.string() });
const MessageSchema = z.object({
  subject: z.string().default(''),
  body: z.string(),
});

const SUMMARY_INSTRUCTION = `
You summarise one page of a small business website for a sales researcher.
Write two or three plain sentences on what the business does, who it serves
and anything distinctive. If the page has no useful content return an empty
abstract.

OUTPUT FORMAT (JSON ONLY):
{ "abstract": "..." }
`;

const MESSAGE_INSTRUCTION = `
You write a short, friendly first outreach email to a local business owner.
Use only the profile and the website summaries given. No invented facts,
no placeholders. Keep the body under 120 words and the subject under 50
characters.

OUTPUT FORMAT (JSON ONLY):
{ "subject": "...", "body": "..." }
`;

@Injectable()
export class GeminiSummarizer implements Summarizer {
  private readonly logger = new Logger(GeminiSummarizer.name);
  private readonly summaryModel: GenerativeModel;
  private readonly messageModel: GenerativeModel;
  private readonly maxPromptChars: number;

  constructor(
    private readonly configService: ConfigService,
    settings: ExecutionSettings,
  ) {
    const genAI = new GoogleGenerativeAI(
      this.configService.get<string>('GEMINI_API_KEY') || '',
    );
    const model = this.configService.get<string>('GEMINI_MODEL') || 'gemini-2.0-flash';
    const generationConfig = {
      responseMimeType: 'application/json',
      maxOutputTokens: settings.summarizer.maxOutputTokens,
    };
    this.maxPromptChars = settings.summarizer.maxInputTokens * CHARS_PER_TOKEN;

    this.summaryModel = genAI.getGenerativeModel({
      model,
      systemInstruction: SUMMARY_INSTRUCTION,
      generationConfig,
    });
    this.messageModel = genAI.getGenerativeModel({
      model,
      systemInstruction: MESSAGE_INSTRUCTION,
      generationConfig,
    });
  }

  async summarize(content: PageContent): Promise<Summary> {
    const { json, usage } = await this.generate(
      this.summaryModel,
      `Page ${content.url}:\n\n${content.text}`,
    );
    const parsed = SummarySchema.safeParse(json);
    if (!parsed.success) {
      throw new CapabilityError(PROVIDER, 'summary response has no abstract');
    }
    return { abstract: parsed.data.abstract.trim(), usage };
  }

  async compose(
    profile: ContactProfile,
    summaries: readonly string[],
  ): Promise<Message> {
    const context = {
      business: profile,
      websiteSummaries: summaries.length > 0 ? summaries : 'NOT_AVAILABLE',
    };
    const { json, usage } = await this.generate(
      this.messageModel,
      `Write the email for: ${JSON.stringify(context)}`,
    );
    const parsed = MessageSchema.safeParse(json);
    if (!parsed.success) {
      throw new CapabilityError(PROVIDER, 'message response is malformed');
    }
    return {
      subject: parsed.data.subject.trim(),
      body: parsed.data.body.trim(),
      usage,
    };
  }

  private async generate(
    model: GenerativeModel,
    prompt: string,
  ): Promise<{ json: unknown; usage: TokenUsage }> {
    try {
      const result = await model.generateContent(prompt.slice(0, this.maxPromptChars));
      const text = result.response.text().trim();
      const usage: TokenUsage = {
        inputTokens: result.response.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: result.response.usageMetadata?.candidatesTokenCount ?? 0,
      };

      const jsonMatch = text.match(/\{[\s\S]*\}/);
      if (!jsonMatch) {
        throw new CapabilityError(PROVIDER, 'No JSON object found in response');
      }
      return { json: JSON.parse(jsonMatch[0]), usage };
    } catch (error: unknown) {
      if (error instanceof GoogleGenerativeAIFetchError) {
        if (error.status === 429 || error.status === 503) {
          throw new ThrottledError(PROVIDER);
        }
        throw new CapabilityError(PROVIDER, error.message, error.status);
      }
      if (error instanceof CapabilityError) throw error;

      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`AI_SUMMARIZER_ERROR: ${errorMessage}`);
      throw new CapabilityError(PROVIDER, errorMessage);
    }
  }
}
