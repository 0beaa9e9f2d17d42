// chatForm.ts - Form defaults and attachment helpers for the chat UI

import type { MediaKind, SamplingConfig } from './types';

// Must match the server's DEFAULT_SAMPLING, which fills fields the form leaves blank.
export const DEFAULT_SAMPLING: SamplingConfig = {
  temperature: 0.4,
  topP: 1,
  topK: 32,
  maxOutputTokens: 1024,
};

export interface SliderConfig {
  key: keyof SamplingConfig;
  label: string;
  min: number;
  max: number;
  step: number;
}

export const SLIDERS: readonly SliderConfig[] = [
  { key: 'temperature', label: 'Temperature', min: 0, max: 1, step: 0.1 },
  { key: 'maxOutputTokens', label: 'Max output tokens', min: 1, max: 2048, step: 1 },
  { key: 'topK', label: 'Top-K', min: 1, max: 40, step: 1 },
  { key: 'topP', label: 'Top-P', min: 0.1, max: 1, step: 0.1 },
];

const IMAGE_EXTENSIONS = ['.png', '.jpeg', '.jpg'];
const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.mpeg', '.mpg', '.avi', '.wmv', '.mpegps', '.flv'];

export const IMAGE_ACCEPT = IMAGE_EXTENSIONS.join(',');
export const VIDEO_ACCEPT = VIDEO_EXTENSIONS.join(',');

function getExtension(fileName: string): string {
  const idx = fileName.lastIndexOf('.');
  if (idx < 0) return '';
  return fileName.slice(idx).toLowerCase();
}

export function mediaKindOf(fileName: string): MediaKind | null {
  const extension = getExtension(fileName);
  if (IMAGE_EXTENSIONS.includes(extension)) return 'image';
  if (VIDEO_EXTENSIONS.includes(extension)) return 'video';
  return null;
}

/**
 * Snaps a slider value into range and onto its step grid.
 */
export function clampSample(slider: SliderConfig, value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_SAMPLING[slider.key];
  const bounded = Math.min(slider.max, Math.max(slider.min, value));
  const steps = Math.round((bounded - slider.min) / slider.step);
  const snapped = slider.min + steps * slider.step;
  const decimals = slider.step < 1 ? String(slider.step).split('.')[1]?.length ?? 0 : 0;
  return Number(Math.min(slider.max, snapped).toFixed(decimals));
}

export function omittedMediaNotice(kind: MediaKind): string {
  return kind === 'image'
    ? '(Image too large to display)'
    : '(Video too large to display)';
}
