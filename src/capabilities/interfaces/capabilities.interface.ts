import type { CoverageUnit } from '../../coverage/interfaces/coverage.interface';

export const DISCOVERY_PROVIDER = 'DISCOVERY_PROVIDER';
export const CONTENT_FETCHER = 'CONTENT_FETCHER';
export const SUMMARIZER = 'SUMMARIZER';
export const VERIFIER = 'VERIFIER';

/** A business or contact as returned by the discovery provider */
export interface RawRecord {
  externalId: string;
  name: string;
  email: string | null;
  phone: string | null;
  website: string | null;
  category: string | null;
  address: string | null;
  rating: number | null;
  reviewCount: number | null;
}

export interface DiscoverySearchOptions {
  maxResults: number;
}

export interface DiscoveryProvider {
  search(
    unit: CoverageUnit,
    keywords: readonly string[],
    options: DiscoverySearchOptions,
  ): Promise<RawRecord[]>;
}

export type FetchResult =
  | { found: true; url: string; html: string; bytes: number; truncated: boolean }
  | { found: false; url: string; reason: string };

export interface FetchOptions {
  maxBytes: number;
  /** Cuts short any pacing wait before the request; never aborts the request */
  signal?: AbortSignal;
}

export interface ContentFetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchResult>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface PageContent {
  url: string;
  text: string;
}

export interface Summary {
  abstract: string;
  usage: TokenUsage;
}

/** Profile fields the outreach message is written from */
export interface ContactProfile {
  name: string;
  category: string | null;
  address: string | null;
  website: string | null;
  keywords: readonly string[];
}

export interface Message {
  subject: string;
  body: string;
  usage: TokenUsage;
}

export interface Summarizer {
  summarize(content: PageContent): Promise<Summary>;
  compose(profile: ContactProfile, summaries: readonly string[]): Promise<Message>;
}

export type VerificationStatus =
  | 'deliverable'
  | 'undeliverable'
  | 'risky'
  | 'unknown';

export interface ConfidenceScore {
  status: VerificationStatus;
  /** 0-100 */
  score: number;
  reason: string | null;
}

export interface Verifier {
  verify(contactChannel: string): Promise<ConfidenceScore>;
}
