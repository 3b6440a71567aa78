import type { BrandInfo } from '@/lib/types';

const HEX_RE = /#(?:[0-9a-f]{6}|[0-9a-f]{3})\b/i;

export const SWATCH_KEYS = ['color_primario', 'color_secundario', 'color_texto', 'color_fondo'] as const;

export type Swatch = { key: (typeof SWATCH_KEYS)[number]; hex: string };

/** First hex code in a value like "gris azulado (#334455)", lower-cased and expanded to 6 digits. */
export function findHex(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const m = value.match(HEX_RE);
  if (!m) return null;
  const h = m[0].slice(1).toLowerCase();
  return '#' + (h.length === 3 ? h.split('').map(c => c + c).join('') : h);
}

export function brandSwatches(info: BrandInfo): Swatch[] {
  const out: Swatch[] = [];
  for (const key of SWATCH_KEYS) {
    const hex = findHex(info[key]);
    if (hex) out.push({ key, hex });
  }
  return out;
}

export function hexToRgb(hex: string) {
  const v = parseInt(hex.slice(1), 16);
  return { r: (v >> 16) & 255, g: (v >> 8) & 255, b: v & 255 };
}

/** Black or white, whichever reads better on the swatch. */
export function labelColor(hex: string): '#000000' | '#ffffff' {
  const { r, g, b } = hexToRgb(hex);
  const luma = (0.299 * r + 0.587 * g + 0.114 * b) / 255;
  return luma > 0.55 ? '#000000' : '#ffffff';
}
