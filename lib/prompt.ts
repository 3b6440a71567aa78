import type { BrandKey } from '@/lib/extract';
import type { BrandInfo } from '@/lib/types';

export const BRAND_DEFAULTS: Record<Exclude<BrandKey, 'notas_adicionales'>, string> = {
  color_primario: '#000000',
  color_secundario: '#666666',
  color_texto: 'gris oscuro',
  color_fondo: 'blanco',
  tipografia: 'Inter',
  estilo: 'moderno, limpio, profesional',
};

export const PROMPT_FILENAME = 'prompt_lovable.txt';

function pick(info: BrandInfo, key: keyof typeof BRAND_DEFAULTS): string {
  const v = info[key];
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return BRAND_DEFAULTS[key];
}

/** Pure: the sections text is placed as is, never edited. */
export function composeLandingPrompt(brandInfo: BrandInfo, sections: string): string {
  const primary = pick(brandInfo, 'color_primario');
  const secondary = pick(brandInfo, 'color_secundario');

  return [
    `Crea una landing page de registro para webinar usando las imágenes adjuntas como referencia:`,
    `- Imagen del brandboard → para colores, tipografía y estilo visual`,
    `- Imágenes de estructura (opcional) → para ver layouts de secciones`,
    ``,
    `DATOS TÉCNICOS:`,
    `- Color primario: ${primary}`,
    `- Color secundario: ${secondary}`,
    `- Color de texto: ${pick(brandInfo, 'color_texto')}`,
    `- Color de fondo: ${pick(brandInfo, 'color_fondo')}`,
    `- Tipografía: ${pick(brandInfo, 'tipografia')}`,
    `- Estilo: ${pick(brandInfo, 'estilo')}`,
    `- Botones: fondo ${secondary}, texto blanco, bordes redondeados`,
    ``,
    `IMPORTANTE: NO modifiques el texto que te proporciono. Cópialo exactamente palabra por palabra, sin cambiar ni una coma.`,
    ``,
    `SECCIONES:`,
    ``,
    sections,
    ``,
    `NOTAS TÉCNICAS:`,
    `- Mobile-first, responsive`,
    `- Donde indique FOTO, IMAGEN o MOCKUP, dejar placeholder gris`,
    `- Formulario con validación básica`,
    `- Contadores regresivos funcionales si aplica`,
    `- Scroll suave entre secciones`,
    ``,
    `RECORDATORIO: No modifiques el texto. Cada palabra, cada coma, cada punto debe ser exacto.`,
  ].join('\n');
}
