// smartFetch.ts - Posts a chat turn and follows the server's event stream

import { CONFIG } from './config';
import type { ChatPayload, Transcript, Turn, TurnContent } from './types';

export type HistoryListener = (history: Transcript) => void;

type StreamEvent =
  | { type: 'history'; history: Transcript }
  | { type: 'error'; error: string };

function isTurnContent(value: unknown): value is TurnContent {
  return !!value && typeof value === 'object' && 'text' in value && typeof value.text === 'string';
}

function isTurn(value: unknown): value is Turn {
  if (!Array.isArray(value) || value.length !== 2) return false;
  const [user, model] = value;
  return (isTurnContent(user) && model === null) || (user === null && isTurnContent(model));
}

function isTranscript(value: unknown): value is Transcript {
  return Array.isArray(value) && value.every(isTurn);
}

/**
 * Parses one `data:` payload. Returns null for payloads that are not chat events.
 */
export function parseStreamEvent(data: string): StreamEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    console.warn('[smartFetch] Ignoring malformed event:', data);
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || !('type' in parsed)) return null;

  if (parsed.type === 'history' && 'history' in parsed && isTranscript(parsed.history)) {
    return { type: 'history', history: parsed.history };
  }
  if (parsed.type === 'error') {
    const error = 'error' in parsed && typeof parsed.error === 'string' ? parsed.error : 'Chat request failed';
    return { type: 'error', error };
  }
  return null;
}

export function buildChatForm(payload: ChatPayload): FormData {
  const form = new FormData();
  form.set('text', payload.text);
  form.set('history', JSON.stringify(payload.history));
  form.set('temperature', String(payload.sampling.temperature));
  form.set('topP', String(payload.sampling.topP));
  form.set('topK', String(payload.sampling.topK));
  form.set('maxOutputTokens', String(payload.sampling.maxOutputTokens));
  if (payload.image) form.set('image', payload.image, payload.image.name);
  if (payload.video) form.set('video', payload.video, payload.video.name);
  return form;
}

async function errorFromResponse(response: Response): Promise<Error> {
  const body = await response.text();
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
      return new Error(parsed.error);
    }
  } catch {
    // Not JSON; fall through to the status line.
  }
  return new Error(`Chat request failed: ${response.status} ${response.statusText}`.trim());
}

/**
 * Sends the turn and calls `onHistory` each time the server publishes an
 * updated transcript. Resolves with the last transcript received.
 */
export async function submitChat(payload: ChatPayload, onHistory: HistoryListener): Promise<Transcript> {
  const response = await fetch(CONFIG.CHAT_ENDPOINT, {
    method: 'POST',
    body: buildChatForm(payload),
  });

  if (!response.ok) {
    throw await errorFromResponse(response);
  }
  if (!response.body) {
    throw new Error('Chat response has no body');
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let latest = payload.history;

  const handleLine = (line: string): boolean => {
    if (!line.startsWith('data: ')) return false;
    const data = line.slice('data: '.length).trim();
    if (data === '[DONE]') return true;

    const event = parseStreamEvent(data);
    if (!event) return false;
    if (event.type === 'error') {
      throw new Error(event.error);
    }
    latest = event.history;
    onHistory(event.history);
    return false;
  };

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    for (const line of lines) {
      if (handleLine(line)) {
        await reader.cancel();
        return latest;
      }
    }
  }

  buffer += decoder.decode();
  if (buffer) handleLine(buffer);
  return latest;
}
