import { Injectable } from '@nestjs/common';
import {
  ContactProfile,
  Message,
  PageContent,
  Summarizer,
  Summary,
} from '../interfaces/capabilities.interface';

/** Extractive stand-in: first sentence of the page, token counts by length. */
@Injectable()
export class MockSummarizer implements Summarizer {
  summarize(content: PageContent): Promise<Summary> {
    const firstSentence = content.text.split(/(?<=[.!?])\s/)[0] ?? '';
    const abstract = firstSentence.slice(0, 280).trim();
    return Promise.resolve({
      abstract,
      usage: { inputTokens: tokens(content.text), outputTokens: tokens(abstract) },
    });
  }

  compose(profile: ContactProfile, summaries: readonly string[]): Promise<Message> {
    const about = summaries[0] ? ` I read that ${lowerFirst(summaries[0])}` : '';
    const body = `Hi ${profile.name} team,${about} Would you be open to a short call next week?`;
    return Promise.resolve({
      subject: `Quick question for ${profile.name}`.slice(0, 50),
      body,
      usage: {
        inputTokens: tokens(summaries.join(' ')) + 50,
        outputTokens: tokens(body),
      },
    });
  }
}

function tokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}
