// response_orchestrator.ts - Decide how a submission is answered and append the model turn

import { describeSupportedFormats, extensionOf, isSupportedExtension, mimeTypeFor } from './file_classifier.ts';
import type { InferenceBackend } from './gemini_backend.ts';
import { appendModelTurn } from './history_renderer.ts';
import { uploadMedia } from './media_uploader.ts';
import { exceedsCeiling, formatMegabytes, promptSizeMb, roundToTenth } from './prompt_sizer.ts';
import { formatLogTimestamp } from './request_context.ts';
import type { BlobStore } from './storage_backend.ts';
import type { UsageLogger, UsageLogInput } from './usage_logger.ts';
import {
  errorMessage,
  failure,
  type GenerationResult,
  type Outcome,
  type SamplingConfig,
  success,
  type Transcript,
} from './types.ts';

export const EMPTY_TEXT_REPLY = 'Please enter some text.';
export const UNSUPPORTED_COMBINATION_REPLY =
  'Sending an image and a video in the same message is not supported.';
export const GENERATION_FAILED_REPLY = 'Sorry, a response could not be generated. Please try again.';

export function sizeExceededReply(actualMb: number, limitMb: number): string {
  return `Prompts containing an image or video and text must not exceed ${formatMegabytes(limitMb)}MB. ` +
    `The current prompt size is ${formatMegabytes(roundToTenth(actualMb))}MB.`;
}

export interface ChatRequest {
  history: Transcript;
  text: string;
  imagePath?: string | null;
  videoPath?: string | null;
  sampling: SamplingConfig;
  user: string;
}

export interface ResponderDeps {
  inference: InferenceBackend;
  store: BlobStore;
  mediaBucket: string;
  maxPromptSizeMb: number;
  timeZone: string;
  usageLogger?: UsageLogger | null;
  now?: () => Date;
}

export type Responder = (request: ChatRequest) => Promise<Transcript>;

export function createResponder(deps: ResponderDeps): Responder {
  const now = deps.now ?? (() => new Date());

  async function logUsage(requestedAt: Date, input: Omit<UsageLogInput, 'timestamp'>): Promise<void> {
    if (!deps.usageLogger) return;
    try {
      const timestamp = formatLogTimestamp(requestedAt, deps.timeZone);
      const logged = await deps.usageLogger.log({ timestamp, ...input });
      if (!logged.ok) {
        console.error('[Chat] Usage log not stored:', logged.error);
      }
    } catch (err) {
      console.error('[Chat] Usage logging failed:', errorMessage(err));
    }
  }

  async function generate(call: () => Promise<GenerationResult>): Promise<Outcome<GenerationResult>> {
    try {
      return success(await call());
    } catch (err) {
      console.error('[Chat] Generation failed:', errorMessage(err));
      return failure('inference_failed', `Generation failed: ${errorMessage(err)}`);
    }
  }

  async function replyWithAttachment(
    request: ChatRequest,
    filePath: string,
    requestedAt: Date,
  ): Promise<string> {
    const { text, sampling } = request;

    const size = await promptSizeMb(text, filePath);
    if (!size.ok) return GENERATION_FAILED_REPLY;
    if (exceedsCeiling(size.value, deps.maxPromptSizeMb)) {
      return sizeExceededReply(size.value, deps.maxPromptSizeMb);
    }

    const extension = extensionOf(filePath);
    if (!extension.ok) return GENERATION_FAILED_REPLY;
    if (!isSupportedExtension(extension.value)) return describeSupportedFormats();

    const mimeType = mimeTypeFor(extension.value);
    if (!mimeType) return GENERATION_FAILED_REPLY;

    const uploaded = await uploadMedia(deps.store, deps.mediaBucket, filePath);
    if (!uploaded.ok) return GENERATION_FAILED_REPLY;

    const result = await generate(() =>
      deps.inference.generateMultimodal([{ uri: uploaded.value, mimeType }, text], sampling)
    );
    if (!result.ok) return GENERATION_FAILED_REPLY;

    await logUsage(requestedAt, {
      user: request.user,
      text,
      sampling,
      result: result.value,
      media: { locator: uploaded.value, localPath: filePath },
    });
    return result.value.text;
  }

  async function decideReply(request: ChatRequest): Promise<string> {
    const { text, imagePath, videoPath, sampling } = request;
    const requestedAt = now();

    if (!text) return EMPTY_TEXT_REPLY;

    if (!imagePath && !videoPath) {
      const result = await generate(() => deps.inference.generateText(text, sampling));
      if (!result.ok) return GENERATION_FAILED_REPLY;
      await logUsage(requestedAt, { user: request.user, text, sampling, result: result.value });
      return result.value.text;
    }

    if (imagePath && videoPath) return UNSUPPORTED_COMBINATION_REPLY;

    const filePath = imagePath || videoPath;
    if (!filePath) return GENERATION_FAILED_REPLY;
    return await replyWithAttachment(request, filePath, requestedAt);
  }

  return async (request) => {
    const reply = await decideReply(request);
    return appendModelTurn(request.history, reply);
  };
}
