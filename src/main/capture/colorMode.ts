import type { ColorMode } from '@shared/types/capture.types';

export interface ColorModeResult {
  mode: ColorMode;
  /** Present when the input was not a recognised mode */
  warning?: string;
}

/** Case-insensitive; anything unrecognised falls back to WHITE */
export function coerceColorMode(value: string): ColorModeResult {
  const normalized = value.trim().toUpperCase();
  if (normalized === 'WHITE' || normalized === 'BLACK') {
    return { mode: normalized };
  }
  return {
    mode: 'WHITE',
    warning: `Unsupported color mode '${value}', using WHITE`,
  };
}
