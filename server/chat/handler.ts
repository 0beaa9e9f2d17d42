// handler.ts - HTTP handler for the chat endpoint (multipart in, server-sent events out)

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { appendUserTurn } from './history_renderer.ts';
import { resolveUserName } from './request_context.ts';
import type { Responder } from './response_orchestrator.ts';
import {
  type AttachmentKind,
  errorMessage,
  type SamplingConfig,
  type Transcript,
  type Turn,
  type TurnContent,
} from './types.ts';

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

export const DEFAULT_SAMPLING: SamplingConfig = {
  temperature: 0.4,
  topP: 1,
  topK: 32,
  maxOutputTokens: 1024,
};

export interface ChatHandlerDeps {
  respond: Responder;
  maxPromptSizeMb: number;
  userIdentityHeader: string;
  devMode?: boolean;
  tempRoot?: string;
}

export type FetchHandler = (req: Request) => Promise<Response>;

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...CORS_HEADERS, 'Content-Type': 'application/json' },
  });
}

function isAttachmentKind(value: unknown): value is AttachmentKind {
  return value === 'image' || value === 'video';
}

function isTurnContent(value: unknown): value is TurnContent {
  if (!value || typeof value !== 'object') return false;
  if (!('text' in value) || typeof value.text !== 'string') return false;
  if ('omittedMedia' in value && value.omittedMedia !== undefined && !isAttachmentKind(value.omittedMedia)) {
    return false;
  }
  if ('media' in value && value.media !== undefined) {
    const media = value.media;
    if (!media || typeof media !== 'object') return false;
    if (!('kind' in media) || !isAttachmentKind(media.kind)) return false;
    if (!('mimeType' in media) || typeof media.mimeType !== 'string') return false;
    if (!('dataUrl' in media) || typeof media.dataUrl !== 'string') return false;
  }
  return true;
}

function isTurn(value: unknown): value is Turn {
  if (!Array.isArray(value) || value.length !== 2) return false;
  const [user, model] = value;
  return (isTurnContent(user) && model === null) || (user === null && isTurnContent(model));
}

export function parseHistory(raw: FormDataEntryValue | null): Transcript | null {
  if (raw === null) return [];
  if (typeof raw !== 'string') return null;
  if (!raw.trim()) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return null;
    const turns: Turn[] = [];
    for (const item of parsed) {
      if (!isTurn(item)) return null;
      turns.push(item);
    }
    return turns;
  } catch {
    return null;
  }
}

export function parseSampling(form: FormData): SamplingConfig | null {
  const read = (name: string, fallback: number): number | null => {
    const raw = form.get(name);
    if (raw === null || (typeof raw === 'string' && raw.trim() === '')) return fallback;
    if (typeof raw !== 'string') return null;
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  };

  const temperature = read('temperature', DEFAULT_SAMPLING.temperature);
  const topP = read('topP', DEFAULT_SAMPLING.topP);
  const topK = read('topK', DEFAULT_SAMPLING.topK);
  const maxOutputTokens = read('maxOutputTokens', DEFAULT_SAMPLING.maxOutputTokens);
  if (temperature === null || topP === null || topK === null || maxOutputTokens === null) {
    return null;
  }
  return { temperature, topP, topK, maxOutputTokens };
}

function uploadedFile(form: FormData, name: string): File | null {
  const value = form.get(name);
  if (value === null || typeof value === 'string') return null;
  if (!value.name && value.size === 0) return null;
  return value;
}

async function spoolFile(dir: string, slot: AttachmentKind, file: File): Promise<string> {
  const slotDir = join(dir, slot);
  await mkdir(slotDir, { recursive: true });
  const target = join(slotDir, basename(file.name) || 'upload');
  await writeFile(target, new Uint8Array(await file.arrayBuffer()));
  return target;
}

function parsePath(url: string): 'chat' | 'health' | 'unknown' {
  const pathname = new URL(url).pathname.replace(/\/+$/, '');
  if (pathname === '/api/chat') return 'chat';
  if (pathname === '/healthz') return 'health';
  return 'unknown';
}

export function createChatHandler(deps: ChatHandlerDeps): FetchHandler {
  const tempRoot = deps.tempRoot ?? tmpdir();
  const encoder = new TextEncoder();

  return async (req: Request) => {
    if (req.method === 'OPTIONS') {
      return new Response('ok', { headers: CORS_HEADERS });
    }

    const route = parsePath(req.url);
    if (route === 'health') {
      return jsonResponse({ ok: true }, 200);
    }
    if (route === 'unknown') {
      return jsonResponse({ error: 'Not found' }, 404);
    }
    if (req.method !== 'POST') {
      return jsonResponse({ error: 'Method not allowed' }, 405);
    }

    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      return jsonResponse({ error: 'Bad Request: Invalid form data' }, 400);
    }

    const history = parseHistory(form.get('history'));
    if (!history) {
      return jsonResponse({ error: 'Bad Request: Invalid history' }, 400);
    }

    const sampling = parseSampling(form);
    if (!sampling) {
      return jsonResponse({ error: 'Bad Request: Sampling parameters must be numbers' }, 400);
    }

    const rawText = form.get('text');
    const text = typeof rawText === 'string' ? rawText : '';
    const image = uploadedFile(form, 'image');
    const video = uploadedFile(form, 'video');
    const user = resolveUserName(req.headers, deps.userIdentityHeader);

    const workDir = await mkdtemp(join(tempRoot, 'chat-'));
    let imagePath: string | null = null;
    let videoPath: string | null = null;
    try {
      if (image) imagePath = await spoolFile(workDir, 'image', image);
      if (video) videoPath = await spoolFile(workDir, 'video', video);
    } catch (err) {
      console.error('[Chat] Spooling attachments failed:', errorMessage(err));
      await rm(workDir, { recursive: true, force: true });
      return jsonResponse({ error: 'Failed to receive attachments' }, 500);
    }

    if (deps.devMode) {
      console.log('[DEV] Request:', {
        user,
        textLength: text.length,
        historyTurns: history.length,
        image: image?.name ?? null,
        video: video?.name ?? null,
        sampling,
      });
    }

    // Cleared when the client goes away; writes after that are dropped.
    let open = true;
    const stream = new ReadableStream<Uint8Array>({
      async start(controller) {
        const write = (chunk: string) => {
          if (!open) return;
          try {
            controller.enqueue(encoder.encode(chunk));
          } catch (err) {
            open = false;
            console.warn('[Chat] Client stream closed:', errorMessage(err));
          }
        };
        const send = (payload: unknown) => write(`data: ${JSON.stringify(payload)}\n\n`);

        try {
          const withUserTurn = await appendUserTurn(
            history,
            text,
            { imagePath, videoPath },
            deps.maxPromptSizeMb,
          );
          send({ type: 'history', history: withUserTurn });

          const withReply = await deps.respond({
            history: withUserTurn,
            text,
            imagePath,
            videoPath,
            sampling,
            user,
          });
          send({ type: 'history', history: withReply });
        } catch (err) {
          console.error('[Chat] Request failed:', errorMessage(err));
          send({ type: 'error', error: 'Chat request failed' });
        } finally {
          await rm(workDir, { recursive: true, force: true }).catch((err: unknown) => {
            console.error('[Chat] Temp cleanup failed:', { workDir, error: errorMessage(err) });
          });
          write('data: [DONE]\n\n');
          if (open) {
            open = false;
            controller.close();
          }
        }
      },
      cancel() {
        open = false;
      },
    });

    return new Response(stream, {
      status: 200,
      headers: {
        ...CORS_HEADERS,
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
      },
    });
  };
}
