// types.ts - Transcript and request shapes shared by the chat UI

export type MediaKind = 'image' | 'video';

export interface InlineMedia {
  kind: MediaKind;
  mimeType: string;
  dataUrl: string;
}

export interface TurnContent {
  text: string;
  media?: InlineMedia;
  omittedMedia?: MediaKind;
}

// [user, null] or [null, model]
export type Turn = [TurnContent, null] | [null, TurnContent];
export type Transcript = Turn[];

export interface SamplingConfig {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface ChatPayload {
  text: string;
  history: Transcript;
  image?: File | null;
  video?: File | null;
  sampling: SamplingConfig;
}
