import { BRAND_PROMPT, NOT_IDENTIFIED } from '@/lib/prompts';
import type { BrandInfo, UploadedImage } from '@/lib/types';
import { complete, imageParts, type VisionModel } from '@/lib/vision';

export const BRAND_MAX_TOKENS = 1000;

export const BRAND_KEYS = [
  'color_primario',
  'color_secundario',
  'color_texto',
  'color_fondo',
  'tipografia',
  'estilo',
  'notas_adicionales',
] as const;

export type BrandKey = (typeof BRAND_KEYS)[number];

/**
 * Keys filled with the sentinel when the reply is not JSON. Narrower than
 * BRAND_KEYS on purpose: the missing ones get the assembler's defaults.
 */
export const FALLBACK_KEYS = ['color_primario', 'color_secundario', 'tipografia', 'estilo_botones'] as const;

export type BrandDecodeResult =
  | { ok: true; brandInfo: BrandInfo }
  | { ok: false; brandInfo: BrandInfo; raw: string };

/** Drops a ``` / ```json fence around the reply, if there is one. */
export function stripFence(text: string): string {
  let out = text.trim();
  if (out.startsWith('```')) {
    out = out.split('```')[1] ?? '';
    if (out.startsWith('json')) out = out.slice(4);
  }
  return out.trim();
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function fallbackBrandInfo(raw: string): BrandInfo {
  const out: BrandInfo = {};
  for (const key of FALLBACK_KEYS) out[key] = NOT_IDENTIFIED;
  out.notas_adicionales = raw;
  return out;
}

/** Never throws: anything that is not a JSON object becomes the fallback record. */
export function decodeBrandInfo(text: string): BrandDecodeResult {
  const raw = stripFence(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, brandInfo: fallbackBrandInfo(raw), raw };
  }
  if (!isPlainObject(parsed)) return { ok: false, brandInfo: fallbackBrandInfo(raw), raw };
  return { ok: true, brandInfo: parsed };
}

export async function extractBrandInfo(vision: VisionModel, images: UploadedImage[]): Promise<BrandDecodeResult> {
  const reply = await complete(
    vision,
    [{ type: 'text', text: BRAND_PROMPT }, ...imageParts(images)],
    BRAND_MAX_TOKENS,
  );
  return decodeBrandInfo(reply);
}
