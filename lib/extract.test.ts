import { describe, it, expect, vi } from 'vitest';
import { decodeBrandInfo, extractBrandInfo, stripFence } from './extract';
import { BRAND_PROMPT } from './prompts';

function fakeVision(...replies: string[]) {
  const create = vi.fn();
  for (const r of replies) create.mockResolvedValueOnce({ choices: [{ message: { content: r } }] });
  return { vision: { client: { chat: { completions: { create } } }, model: 'test-model' }, create };
}

describe('stripFence', () => {
  it('removes a json-labelled fence', () => {
    expect(stripFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a bare fence', () => {
    expect(stripFence('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('only trims unfenced text', () => {
    expect(stripFence('  {"a":1}\n')).toBe('{"a":1}');
  });
});

describe('decodeBrandInfo', () => {
  it('returns the decoded object unchanged', () => {
    const text = '{"color_primario":"#112233","extra":{"n":1},"tipografia":"Poppins"}';
    expect(decodeBrandInfo(text)).toEqual({
      ok: true,
      brandInfo: { color_primario: '#112233', extra: { n: 1 }, tipografia: 'Poppins' },
    });
  });

  it('decodes JSON inside a fence', () => {
    const res = decodeBrandInfo('```json\n{"estilo":"wellness, cercano"}\n```');
    expect(res).toEqual({ ok: true, brandInfo: { estilo: 'wellness, cercano' } });
  });

  it('falls back to the sentinel record with the raw text in the notes', () => {
    const raw = 'Sorry, I cannot read this image';
    expect(decodeBrandInfo(raw)).toEqual({
      ok: false,
      raw,
      brandInfo: {
        color_primario: 'NOT IDENTIFIED',
        color_secundario: 'NOT IDENTIFIED',
        tipografia: 'NOT IDENTIFIED',
        estilo_botones: 'NOT IDENTIFIED',
        notas_adicionales: raw,
      },
    });
  });

  it('leaves style, text and background colors out of the fallback', () => {
    const { brandInfo } = decodeBrandInfo('nope');
    expect(Object.keys(brandInfo)).not.toContain('estilo');
    expect(Object.keys(brandInfo)).not.toContain('color_texto');
    expect(Object.keys(brandInfo)).not.toContain('color_fondo');
  });

  it('treats JSON that is not an object as a failure', () => {
    const res = decodeBrandInfo('["#ffffff"]');
    expect(res.ok).toBe(false);
    expect(res.brandInfo.notas_adicionales).toBe('["#ffffff"]');
  });

  it('keeps the fence-stripped text when a fenced body is broken', () => {
    const res = decodeBrandInfo('```json\n{"color_primario": \n```');
    expect(res.ok).toBe(false);
    expect(res.brandInfo.notas_adicionales).toBe('{"color_primario":');
  });
});

describe('extractBrandInfo', () => {
  it('sends the instruction and one image part per file, in order', async () => {
    const { vision, create } = fakeVision('```json\n{"color_primario":"#112233"}\n```');

    const res = await extractBrandInfo(vision, [
      { name: 'board.png', bytes: new Uint8Array([1, 2, 3]) },
      { name: 'fonts.jpg', bytes: new Uint8Array([4, 5]) },
    ]);

    expect(res).toEqual({ ok: true, brandInfo: { color_primario: '#112233' } });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 1000,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: BRAND_PROMPT },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
            { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,BAU=' } },
          ],
        },
      ],
    });
  });

  it('lets API errors through', async () => {
    const create = vi.fn().mockRejectedValueOnce(new Error('401 No auth credentials found'));
    const vision = { client: { chat: { completions: { create } } }, model: 'test-model' };

    await expect(extractBrandInfo(vision, [{ name: 'a.png', bytes: new Uint8Array([1]) }]))
      .rejects.toThrow('401 No auth credentials found');
  });
});
