// usage_logger.ts - One JSON usage record per successful generation, stored in the log bucket

import { attachmentKindOf, extensionOf } from './file_classifier.ts';
import type { BlobStore } from './storage_backend.ts';
import type { DurationProbe } from './video_duration.ts';
import { formatLocator } from './media_uploader.ts';
import {
  errorMessage,
  failure,
  type GenerationResult,
  type Outcome,
  type SamplingConfig,
  success,
} from './types.ts';

export interface UsageLogInput {
  timestamp: string;
  user: string;
  text: string;
  sampling: SamplingConfig;
  result: GenerationResult;
  media?: {
    locator: string;
    localPath: string;
  };
}

export interface UsageRecord {
  timestamp: string;
  user: string;
  prompt: {
    text: string;
    image_path: string | null;
    video_path: string | null;
    video_duration: number;
    config: {
      temperature: number;
      top_p: number;
      top_k: number;
      max_output_tokens: number;
    };
  };
  response: {
    text: string;
    finish_reason: string | null;
    finish_message: string | null;
    safety_ratings: Array<{ blocked: boolean; category: string; probability: string }>;
    citation_metadata: Array<{
      start_index: number | null;
      end_index: number | null;
      uri: string | null;
      title: string | null;
      license: string | null;
      publication_date: string | null;
    }>;
  };
  usage_metadata: {
    prompt_token_count: number;
    candidates_token_count: number;
    total_token_count: number;
  };
}

export interface UsageLogger {
  log(input: UsageLogInput): Promise<Outcome<string>>;
}

export async function buildUsageRecord(
  input: UsageLogInput,
  probeDuration: DurationProbe,
): Promise<UsageRecord> {
  let imagePath: string | null = null;
  let videoPath: string | null = null;
  let videoDuration = 0;

  if (input.media) {
    const extension = extensionOf(input.media.locator);
    const kind = extension.ok ? attachmentKindOf(extension.value) : null;
    if (kind === 'image') {
      imagePath = input.media.locator;
    } else if (kind === 'video') {
      videoPath = input.media.locator;
      videoDuration = await probeDuration(input.media.localPath);
    }
  }

  const { sampling, result } = input;
  return {
    timestamp: input.timestamp,
    user: input.user,
    prompt: {
      text: input.text,
      image_path: imagePath,
      video_path: videoPath,
      video_duration: videoDuration,
      config: {
        temperature: sampling.temperature,
        top_p: sampling.topP,
        top_k: sampling.topK,
        max_output_tokens: sampling.maxOutputTokens,
      },
    },
    response: {
      text: result.text,
      finish_reason: result.finishReason,
      finish_message: result.finishMessage,
      safety_ratings: result.safetyRatings.map((rating) => ({
        blocked: rating.blocked,
        category: rating.category,
        probability: rating.probability,
      })),
      citation_metadata: result.citations.map((citation) => ({
        start_index: citation.startIndex,
        end_index: citation.endIndex,
        uri: citation.uri,
        title: citation.title,
        license: citation.license,
        publication_date: citation.publicationDate,
      })),
    },
    usage_metadata: {
      prompt_token_count: result.usage.promptTokenCount,
      candidates_token_count: result.usage.candidatesTokenCount,
      total_token_count: result.usage.totalTokenCount,
    },
  };
}

export function usageRecordKey(record: Pick<UsageRecord, 'timestamp' | 'user'>): string {
  return `output/${record.timestamp}-${record.user}.json`;
}

export async function persistUsageRecord(
  store: BlobStore,
  bucket: string,
  record: UsageRecord,
): Promise<Outcome<string>> {
  const key = usageRecordKey(record);
  try {
    await store.put(bucket, key, JSON.stringify(record), { contentType: 'application/json' });
    return success(formatLocator(store.scheme, bucket, key));
  } catch (err) {
    console.error('[UsageLog] Upload failed:', { bucket, key, error: errorMessage(err) });
    return failure('log_upload_failed', `Usage log upload failed: ${errorMessage(err)}`);
  }
}

export function createUsageLogger(
  store: BlobStore,
  bucket: string,
  probeDuration: DurationProbe,
): UsageLogger {
  return {
    async log(input) {
      const record = await buildUsageRecord(input, probeDuration);
      return await persistUsageRecord(store, bucket, record);
    },
  };
}
