// file_classifier.ts - Extension lookup and MIME type mapping for attachments

import { basename } from 'node:path';
import { type AttachmentKind, failure, type Outcome, success } from './types.ts';

export const SUPPORTED_IMAGE_EXTENSIONS = ['png', 'jpeg', 'jpg'] as const;
export const SUPPORTED_VIDEO_EXTENSIONS = [
  'mp4',
  'mov',
  'mpeg',
  'mpg',
  'avi',
  'wmv',
  'mpegps',
  'flv',
] as const;

const IMAGE_EXTENSIONS = new Set<string>(SUPPORTED_IMAGE_EXTENSIONS);
const VIDEO_EXTENSIONS = new Set<string>(SUPPORTED_VIDEO_EXTENSIONS);

export function extensionOf(filePath: string): Outcome<string> {
  const name = basename(filePath);
  const dotIndex = name.lastIndexOf('.');
  if (dotIndex < 0) {
    console.error('[Classifier] Invalid file path:', filePath);
    return failure('invalid_path', `Invalid file path: ${filePath}`);
  }

  const extension = name.slice(dotIndex + 1).toLowerCase();
  if (!extension) {
    console.error('[Classifier] File has no extension:', filePath);
    return failure('missing_extension', `File has no extension: ${filePath}`);
  }

  return success(extension);
}

export function attachmentKindOf(extension: string): AttachmentKind | null {
  const normalized = extension.toLowerCase();
  if (IMAGE_EXTENSIONS.has(normalized)) return 'image';
  if (VIDEO_EXTENSIONS.has(normalized)) return 'video';
  return null;
}

export function isSupportedExtension(extension: string): boolean {
  return attachmentKindOf(extension) !== null;
}

export function mimeTypeFor(extension: string): string | null {
  const normalized = extension.toLowerCase();
  switch (attachmentKindOf(normalized)) {
    case 'image':
      return normalized === 'jpg' || normalized === 'jpeg' ? 'image/jpeg' : `image/${normalized}`;
    case 'video':
      return `video/${normalized}`;
    case null:
      console.error('[Classifier] No MIME type for extension:', extension);
      return null;
  }
}

export function describeSupportedFormats(): string {
  return `Supported formats are ${SUPPORTED_IMAGE_EXTENSIONS.join(', ')} for images ` +
    `and ${SUPPORTED_VIDEO_EXTENSIONS.join(', ')} for videos.`;
}
