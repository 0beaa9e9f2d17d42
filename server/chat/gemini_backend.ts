// gemini_backend.ts - Text and file+text generation against the Gemini API

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  type CitationSource,
  type GenerateContentRequest,
  type GenerateContentResponse,
  GoogleGenerativeAI,
  type Part,
  type SafetyRating,
} from '@google/generative-ai';
import { FileState, GoogleAIFileManager } from '@google/generative-ai/server';
import { parseLocator } from './media_uploader.ts';
import type { BlobStore } from './storage_backend.ts';
import type {
  CitationRecord,
  FileReference,
  GenerationResult,
  SafetyRatingRecord,
  SamplingConfig,
} from './types.ts';

export interface InferenceBackend {
  generateText(text: string, sampling: SamplingConfig): Promise<GenerationResult>;
  generateMultimodal(
    parts: [FileReference, string],
    sampling: SamplingConfig,
  ): Promise<GenerationResult>;
}

// Narrow views of the SDK surface, so tests can hand in fakes.
export interface GeneratedResponse extends GenerateContentResponse {
  text(): string;
}

export interface ContentGenerator {
  generateContent(request: GenerateContentRequest): Promise<{ response: GeneratedResponse }>;
}

export interface ModelProvider {
  getGenerativeModel(params: { model: string }): ContentGenerator;
}

export interface RemoteFile {
  name: string;
  uri: string;
  state: string;
}

export interface FileUploader {
  uploadFile(
    filePath: string,
    metadata: { mimeType: string; displayName?: string },
  ): Promise<{ file: RemoteFile }>;
  getFile(name: string): Promise<RemoteFile>;
}

export interface GeminiBackendOptions {
  models: ModelProvider;
  files: FileUploader;
  store: BlobStore;
  textModel: string;
  multimodalModel: string;
  filePollIntervalMs: number;
  filePollMaxAttempts: number;
}

function toSafetyRatingRecord(rating: SafetyRating): SafetyRatingRecord {
  return {
    category: rating.category,
    probability: rating.probability,
    blocked: 'blocked' in rating && rating.blocked === true,
  };
}

function optionalString(source: object, key: string): string | null {
  if (!(key in source)) return null;
  const value: unknown = Reflect.get(source, key);
  if (typeof value === 'string') return value;
  if (value && typeof value === 'object') return JSON.stringify(value);
  return null;
}

function toCitationRecord(source: CitationSource): CitationRecord {
  return {
    startIndex: source.startIndex ?? null,
    endIndex: source.endIndex ?? null,
    uri: source.uri ?? null,
    title: optionalString(source, 'title'),
    license: source.license ?? null,
    publicationDate: optionalString(source, 'publicationDate'),
  };
}

export function toGenerationResult(response: GeneratedResponse): GenerationResult {
  const candidate = response.candidates?.[0];
  const usage = response.usageMetadata;
  return {
    // text() throws when the candidate was blocked; callers treat that as a failed call.
    text: response.text(),
    finishReason: candidate?.finishReason ?? null,
    finishMessage: candidate?.finishMessage ?? null,
    safetyRatings: (candidate?.safetyRatings ?? []).map(toSafetyRatingRecord),
    citations: (candidate?.citationMetadata?.citationSources ?? []).map(toCitationRecord),
    usage: {
      promptTokenCount: usage?.promptTokenCount ?? 0,
      candidatesTokenCount: usage?.candidatesTokenCount ?? 0,
      totalTokenCount: usage?.totalTokenCount ?? 0,
    },
  };
}

export class GeminiBackend implements InferenceBackend {
  constructor(private readonly options: GeminiBackendOptions) {}

  async generateText(text: string, sampling: SamplingConfig): Promise<GenerationResult> {
    return await this.generate(this.options.textModel, [{ text }], sampling);
  }

  async generateMultimodal(
    [file, text]: [FileReference, string],
    sampling: SamplingConfig,
  ): Promise<GenerationResult> {
    const locator = parseLocator(file.uri);
    if (!locator || locator.scheme !== this.options.store.scheme) {
      throw new Error(`Unrecognized storage locator: ${file.uri}`);
    }

    const bytes = await this.options.store.get(locator.bucket, locator.key);

    // The File API uploads from a path, so the object is spooled to disk first.
    const tempDir = await mkdtemp(join(tmpdir(), 'gemini-upload-'));
    try {
      const tempPath = join(tempDir, basename(locator.key));
      await writeFile(tempPath, bytes);

      const uploaded = await this.options.files.uploadFile(tempPath, {
        mimeType: file.mimeType,
        displayName: locator.key,
      });
      const active = await this.waitUntilActive(uploaded.file);

      return await this.generate(
        this.options.multimodalModel,
        [{ fileData: { fileUri: active.uri, mimeType: file.mimeType } }, { text }],
        sampling,
      );
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }

  private async waitUntilActive(file: RemoteFile): Promise<RemoteFile> {
    let current = file;
    for (let attempt = 1; attempt <= this.options.filePollMaxAttempts; attempt++) {
      if (current.state === FileState.ACTIVE) return current;
      if (current.state === FileState.FAILED) {
        throw new Error(`Gemini File API failed to process ${current.name}`);
      }
      console.log('[Gemini] Waiting for file to become active:', {
        name: current.name,
        state: current.state,
        attempt,
      });
      await sleep(this.options.filePollIntervalMs);
      current = await this.options.files.getFile(current.name);
    }

    if (current.state === FileState.ACTIVE) return current;
    throw new Error(`Gemini file ${current.name} not active after ${this.options.filePollMaxAttempts} polls`);
  }

  private async generate(
    modelName: string,
    parts: Part[],
    sampling: SamplingConfig,
  ): Promise<GenerationResult> {
    const model = this.options.models.getGenerativeModel({ model: modelName });
    const result = await model.generateContent({
      contents: [{ role: 'user', parts }],
      generationConfig: {
        temperature: sampling.temperature,
        topP: sampling.topP,
        topK: sampling.topK,
        maxOutputTokens: sampling.maxOutputTokens,
      },
    });
    return toGenerationResult(result.response);
  }
}

export function createGeminiBackend(params: {
  apiKey: string;
  store: BlobStore;
  textModel: string;
  multimodalModel: string;
  filePollIntervalMs: number;
  filePollMaxAttempts: number;
}): GeminiBackend {
  const { apiKey, ...rest } = params;
  return new GeminiBackend({
    ...rest,
    models: new GoogleGenerativeAI(apiKey),
    files: new GoogleAIFileManager(apiKey),
  });
}
