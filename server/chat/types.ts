// types.ts - Shared types for the chat server (transcript, sampling, outcomes)

export type AttachmentKind = 'image' | 'video';

export interface InlineMedia {
  kind: AttachmentKind;
  mimeType: string;
  dataUrl: string;
}

export interface TurnContent {
  text: string;
  media?: InlineMedia;
  omittedMedia?: AttachmentKind;
}

// A turn pair is either [user, null] or [null, model].
export type Turn = [TurnContent, null] | [null, TurnContent];
export type Transcript = Turn[];

export interface SamplingConfig {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface SafetyRatingRecord {
  category: string;
  probability: string;
  blocked: boolean;
}

export interface CitationRecord {
  startIndex: number | null;
  endIndex: number | null;
  uri: string | null;
  title: string | null;
  license: string | null;
  publicationDate: string | null;
}

export interface TokenUsage {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
}

export interface GenerationResult {
  text: string;
  finishReason: string | null;
  finishMessage: string | null;
  safetyRatings: SafetyRatingRecord[];
  citations: CitationRecord[];
  usage: TokenUsage;
}

export interface FileReference {
  uri: string;
  mimeType: string;
}

export type OutcomeCode =
  | 'invalid_path'
  | 'missing_extension'
  | 'size_unavailable'
  | 'upload_failed'
  | 'inference_failed'
  | 'log_upload_failed';

export interface OutcomeError {
  code: OutcomeCode;
  message: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: OutcomeError };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(code: OutcomeCode, message: string): Outcome<T> {
  return { ok: false, error: { code, message } };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
