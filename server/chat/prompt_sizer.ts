// prompt_sizer.ts - Combined text + file size in megabytes, used for the upload ceiling

import { stat } from 'node:fs/promises';
import { errorMessage, failure, type Outcome, success } from './types.ts';

const BYTES_PER_MB = 1_048_576;

export async function promptSizeMb(text: string | null, filePath: string): Promise<Outcome<number>> {
  try {
    const textBytes = text ? Buffer.byteLength(text, 'utf8') : 0;
    const { size: fileBytes } = await stat(filePath);
    return success((textBytes + fileBytes) / BYTES_PER_MB);
  } catch (err) {
    console.error('[Sizer] Prompt size calculation failed:', { filePath, error: errorMessage(err) });
    return failure('size_unavailable', `Could not size ${filePath}: ${errorMessage(err)}`);
  }
}

export function exceedsCeiling(sizeMb: number, ceilingMb: number): boolean {
  return sizeMb > ceilingMb;
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Prints a megabyte figure with at least one decimal place (4 -> "4.0").
 */
export function formatMegabytes(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
