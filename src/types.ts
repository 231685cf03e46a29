export type OutputFormat = 'text' | 'json';

export type FetchMode = 'http' | 'render';

export type OutcomeKind =
  | 'Ok'
  | 'InvalidInput'
  | 'PolicyDenied'
  | 'Timeout'
  | 'TransportError'
  | 'ServerError'
  | 'RenderError'
  | 'Unexpected';

export interface FetchRequest {
  readonly url: string;
  readonly mode: FetchMode;
  readonly timeoutMs: number;
  readonly headers: Readonly<Record<string, string>>;
}

export interface FetchResult {
  readonly content: string | null;
  readonly outcome: OutcomeKind;
  readonly finalUrl: string;
  readonly status?: number;
}

export type SocialPlatform =
  | 'linkedin'
  | 'twitter'
  | 'facebook'
  | 'instagram'
  | 'youtube'
  | 'pinterest'
  | 'tiktok';

export interface LeadRecord {
  readonly companyName: string | null;
  readonly website: string | null;
  readonly sourceUrl: string;
  readonly canonicalUrl: string | null;
  readonly description: string | null;
  readonly phoneNumbers: readonly string[];
  readonly emails: readonly string[];
  readonly addresses: readonly string[];
  readonly socialLinks: Readonly<Partial<Record<SocialPlatform, string>>>;
}

export type SkipReason = 'fetch-failed' | 'no-contact-signal' | 'extract-failed' | 'cancelled';

export interface SkipEvent {
  url: string;
  reason: SkipReason;
  outcome?: OutcomeKind;
}

export interface PipelineSummary {
  urlsAttempted: number;
  pagesFetched: number;
  recordsExtracted: number;
  recordsSaved: number;
  urlsSkipped: number;
  saveFailures: number;
  outcomeCounts: Partial<Record<OutcomeKind, number>>;
  skipReasons: Partial<Record<SkipReason, number>>;
  durationMs: number;
  actualMaxConcurrency: number;
  cancelled: boolean;
}

export interface PipelineHandlers {
  onRecord?(record: LeadRecord): void;
  onSkip?(event: SkipEvent): void;
  onComplete?(summary: PipelineSummary): void;
}
