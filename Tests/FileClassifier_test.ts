import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  attachmentKindOf,
  describeSupportedFormats,
  extensionOf,
  isSupportedExtension,
  mimeTypeFor,
  SUPPORTED_IMAGE_EXTENSIONS,
  SUPPORTED_VIDEO_EXTENSIONS,
} from '../server/chat/file_classifier.ts';

describe('file classifier', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('maps jpg and jpeg to image/jpeg and other images to image/<ext>', () => {
    expect(mimeTypeFor('jpg')).toBe('image/jpeg');
    expect(mimeTypeFor('jpeg')).toBe('image/jpeg');
    expect(mimeTypeFor('png')).toBe('image/png');
  });

  it('maps every supported video extension to video/<ext>', () => {
    for (const ext of SUPPORTED_VIDEO_EXTENSIONS) {
      expect(mimeTypeFor(ext)).toBe(`video/${ext}`);
    }
  });

  it('returns null and logs for an unsupported extension', () => {
    expect(mimeTypeFor('gif')).toBeNull();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('supports exactly the 11 image and video extensions, case-insensitively', () => {
    const all = [...SUPPORTED_IMAGE_EXTENSIONS, ...SUPPORTED_VIDEO_EXTENSIONS];
    expect(all).toHaveLength(11);
    for (const ext of all) {
      expect(isSupportedExtension(ext)).toBe(true);
      expect(isSupportedExtension(ext.toUpperCase())).toBe(true);
    }
    expect(isSupportedExtension('gif')).toBe(false);
    expect(isSupportedExtension('webm')).toBe(false);
    expect(isSupportedExtension('')).toBe(false);
  });

  it('tells images from videos', () => {
    expect(attachmentKindOf('PNG')).toBe('image');
    expect(attachmentKindOf('mpegps')).toBe('video');
    expect(attachmentKindOf('txt')).toBeNull();
  });

  it('extracts the lower-cased extension from the base filename', () => {
    expect(extensionOf('/tmp/uploads/Photo.JPG')).toEqual({ ok: true, value: 'jpg' });
    expect(extensionOf('clip.final.MOV')).toEqual({ ok: true, value: 'mov' });
  });

  it('fails when the filename has no dot', () => {
    const result = extensionOf('/tmp/release.v2/README');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('invalid_path');
  });

  it('fails when the suffix is empty', () => {
    const result = extensionOf('/tmp/trailing.');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('missing_extension');
  });

  it('lists every supported format for the user', () => {
    expect(describeSupportedFormats()).toBe(
      'Supported formats are png, jpeg, jpg for images and mp4, mov, mpeg, mpg, avi, wmv, mpegps, flv for videos.',
    );
  });
});
