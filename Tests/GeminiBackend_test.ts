import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FinishReason,
  type GenerateContentRequest,
  HarmCategory,
  HarmProbability,
} from '@google/generative-ai';
import { FileState } from '@google/generative-ai/server';
import {
  type ContentGenerator,
  type FileUploader,
  GeminiBackend,
  type GeneratedResponse,
  type ModelProvider,
  type RemoteFile,
  toGenerationResult,
} from '../server/chat/gemini_backend.ts';
import { MemoryBlobStore, SAMPLING } from './test_support.ts';

function response(text: string | Error): GeneratedResponse {
  return {
    candidates: [
      {
        index: 0,
        content: { role: 'model', parts: [{ text: text instanceof Error ? '' : text }] },
        finishReason: FinishReason.STOP,
        safetyRatings: [
          { category: HarmCategory.HARM_CATEGORY_HARASSMENT, probability: HarmProbability.NEGLIGIBLE },
        ],
        citationMetadata: {
          citationSources: [{ startIndex: 2, endIndex: 9, uri: 'https://example.com/a' }],
        },
      },
    ],
    usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 5, totalTokenCount: 8 },
    text() {
      if (text instanceof Error) throw text;
      return text;
    },
  };
}

class FakeModels implements ModelProvider {
  readonly requests: Array<{ model: string; request: GenerateContentRequest }> = [];

  constructor(private readonly reply: GeneratedResponse) {}

  getGenerativeModel({ model }: { model: string }): ContentGenerator {
    return {
      generateContent: async (request) => {
        this.requests.push({ model, request });
        return { response: this.reply };
      },
    };
  }
}

class FakeFiles implements FileUploader {
  readonly uploads: Array<{ path: string; mimeType: string; displayName?: string; bytes: string }> = [];
  getFileCalls = 0;

  constructor(private readonly states: string[]) {}

  async uploadFile(
    filePath: string,
    metadata: { mimeType: string; displayName?: string },
  ): Promise<{ file: RemoteFile }> {
    const bytes = await readFile(filePath, 'utf8');
    this.uploads.push({ path: filePath, ...metadata, bytes });
    return { file: this.fileAt(0) };
  }

  async getFile(name: string): Promise<RemoteFile> {
    this.getFileCalls += 1;
    expect(name).toBe('files/abc123');
    return this.fileAt(this.getFileCalls);
  }

  private fileAt(index: number): RemoteFile {
    const state = this.states[Math.min(index, this.states.length - 1)] ?? FileState.ACTIVE;
    return { name: 'files/abc123', uri: 'https://files.example.com/abc123', state };
  }
}

function backend(models: ModelProvider, files: FileUploader, store = new MemoryBlobStore()) {
  return new GeminiBackend({
    models,
    files,
    store,
    textModel: 'text-model',
    multimodalModel: 'vision-model',
    filePollIntervalMs: 0,
    filePollMaxAttempts: 3,
  });
}

describe('gemini backend', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('maps an SDK response into a generation result', () => {
    expect(toGenerationResult(response('hello'))).toEqual({
      text: 'hello',
      finishReason: 'STOP',
      finishMessage: null,
      safetyRatings: [{ category: 'HARM_CATEGORY_HARASSMENT', probability: 'NEGLIGIBLE', blocked: false }],
      citations: [
        {
          startIndex: 2,
          endIndex: 9,
          uri: 'https://example.com/a',
          title: null,
          license: null,
          publicationDate: null,
        },
      ],
      usage: { promptTokenCount: 3, candidatesTokenCount: 5, totalTokenCount: 8 },
    });
  });

  it('sends text prompts to the text model with the sampling settings', async () => {
    const models = new FakeModels(response('four'));

    const result = await backend(models, new FakeFiles([])).generateText('2+2?', SAMPLING);

    expect(result.text).toBe('four');
    expect(models.requests).toEqual([
      {
        model: 'text-model',
        request: {
          contents: [{ role: 'user', parts: [{ text: '2+2?' }] }],
          generationConfig: { temperature: 0.4, topP: 1, topK: 32, maxOutputTokens: 1024 },
        },
      },
    ]);
  });

  it('propagates a blocked response as an error', async () => {
    const models = new FakeModels(response(new Error('Candidate was blocked due to SAFETY')));

    await expect(backend(models, new FakeFiles([])).generateText('x', SAMPLING)).rejects.toThrow(
      'Candidate was blocked due to SAFETY',
    );
  });

  it('uploads stored media to the File API and waits until it is active', async () => {
    const store = new MemoryBlobStore();
    await store.put('media', 'clip.mp4', 'video-bytes');
    const models = new FakeModels(response('a cat video'));
    const files = new FakeFiles([FileState.PROCESSING, FileState.PROCESSING, FileState.ACTIVE]);

    const result = await backend(models, files, store).generateMultimodal(
      [{ uri: 'memory://media/clip.mp4', mimeType: 'video/mp4' }, 'what is this?'],
      SAMPLING,
    );

    expect(result.text).toBe('a cat video');
    expect(files.getFileCalls).toBe(2);
    expect(files.uploads).toHaveLength(1);
    expect(files.uploads[0]?.mimeType).toBe('video/mp4');
    expect(files.uploads[0]?.displayName).toBe('clip.mp4');
    expect(files.uploads[0]?.bytes).toBe('video-bytes');
    expect(existsSync(files.uploads[0]?.path ?? '')).toBe(false);
    expect(models.requests[0]?.model).toBe('vision-model');
    expect(models.requests[0]?.request.contents).toEqual([
      {
        role: 'user',
        parts: [
          { fileData: { fileUri: 'https://files.example.com/abc123', mimeType: 'video/mp4' } },
          { text: 'what is this?' },
        ],
      },
    ]);
  });

  it('fails when the File API reports a failed upload', async () => {
    const store = new MemoryBlobStore();
    await store.put('media', 'clip.mp4', 'video-bytes');
    const files = new FakeFiles([FileState.PROCESSING, FileState.FAILED]);

    await expect(
      backend(new FakeModels(response('unused')), files, store).generateMultimodal(
        [{ uri: 'memory://media/clip.mp4', mimeType: 'video/mp4' }, 'x'],
        SAMPLING,
      ),
    ).rejects.toThrow('Gemini File API failed to process files/abc123');
  });

  it('gives up when the file never becomes active', async () => {
    const store = new MemoryBlobStore();
    await store.put('media', 'clip.mp4', 'video-bytes');
    const files = new FakeFiles([FileState.PROCESSING]);

    await expect(
      backend(new FakeModels(response('unused')), files, store).generateMultimodal(
        [{ uri: 'memory://media/clip.mp4', mimeType: 'video/mp4' }, 'x'],
        SAMPLING,
      ),
    ).rejects.toThrow('Gemini file files/abc123 not active after 3 polls');
    expect(files.getFileCalls).toBe(3);
  });

  it('rejects locators from another storage scheme', async () => {
    const models = new FakeModels(response('unused'));

    await expect(
      backend(models, new FakeFiles([])).generateMultimodal(
        [{ uri: 'supabase://media/cat.png', mimeType: 'image/png' }, 'x'],
        SAMPLING,
      ),
    ).rejects.toThrow('Unrecognized storage locator: supabase://media/cat.png');
    expect(models.requests).toHaveLength(0);
  });
});
