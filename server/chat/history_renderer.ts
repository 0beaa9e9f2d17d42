// history_renderer.ts - Append user and model turns to the transcript

import { readFile } from 'node:fs/promises';
import { extensionOf, mimeTypeFor } from './file_classifier.ts';
import { exceedsCeiling, promptSizeMb } from './prompt_sizer.ts';
import {
  type AttachmentKind,
  errorMessage,
  type Transcript,
  type Turn,
  type TurnContent,
} from './types.ts';

export interface UserAttachments {
  imagePath?: string | null;
  videoPath?: string | null;
}

async function inlineMediaTurn(
  kind: AttachmentKind,
  filePath: string,
  text: string,
  ceilingMb: number,
): Promise<TurnContent> {
  const size = await promptSizeMb(null, filePath);
  if (!size.ok || exceedsCeiling(size.value, ceilingMb)) {
    return { text, omittedMedia: kind };
  }

  const extension = extensionOf(filePath);
  if (!extension.ok) {
    return { text, omittedMedia: kind };
  }

  try {
    const mimeType = mimeTypeFor(extension.value) ?? `${kind}/${extension.value}`;
    const base64 = (await readFile(filePath)).toString('base64');
    return {
      text,
      media: { kind, mimeType, dataUrl: `data:${mimeType};base64,${base64}` },
    };
  } catch (err) {
    console.error('[History] Inline media read failed:', { filePath, error: errorMessage(err) });
    return { text, omittedMedia: kind };
  }
}

/**
 * Returns a new transcript with the user's submission appended: one turn for
 * plain text, otherwise one turn per attachment (image first).
 */
export async function appendUserTurn(
  history: Transcript,
  text: string,
  attachments: UserAttachments,
  ceilingMb: number,
): Promise<Transcript> {
  const { imagePath, videoPath } = attachments;
  if (!imagePath && !videoPath) {
    return [...history, [{ text }, null]];
  }

  const turns: Turn[] = [];
  if (imagePath) {
    turns.push([await inlineMediaTurn('image', imagePath, text, ceilingMb), null]);
  }
  if (videoPath) {
    turns.push([await inlineMediaTurn('video', videoPath, text, ceilingMb), null]);
  }
  return [...history, ...turns];
}

export function appendModelTurn(history: Transcript, text: string): Transcript {
  return [...history, [null, { text }]];
}
