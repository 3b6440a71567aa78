import { describe, it, expect } from 'vitest';
import { brandSwatches, findHex, hexToRgb, labelColor } from './colors';

describe('findHex', () => {
  it('finds a hex code inside a description', () => {
    expect(findHex('#112233')).toBe('#112233');
    expect(findHex('gris azulado (#33AAFF)')).toBe('#33aaff');
  });

  it('expands the short form', () => {
    expect(findHex('#fff')).toBe('#ffffff');
  });

  it('returns null when there is no usable code', () => {
    expect(findHex('blanco')).toBeNull();
    expect(findHex('#abcd')).toBeNull();
    expect(findHex(42)).toBeNull();
  });
});

describe('brandSwatches', () => {
  it('keeps color keys with a hex code, in key order', () => {
    expect(brandSwatches({
      color_primario: '#112233',
      color_secundario: 'NOT IDENTIFIED',
      color_texto: 'gris (#333)',
      color_fondo: 'blanco',
      tipografia: '#000000',
    })).toEqual([
      { key: 'color_primario', hex: '#112233' },
      { key: 'color_texto', hex: '#333333' },
    ]);
  });
});

describe('hexToRgb / labelColor', () => {
  it('splits channels', () => {
    expect(hexToRgb('#112233')).toEqual({ r: 17, g: 34, b: 51 });
  });

  it('picks a readable label color', () => {
    expect(labelColor('#ffffff')).toBe('#000000');
    expect(labelColor('#000000')).toBe('#ffffff');
    expect(labelColor('#112233')).toBe('#ffffff');
  });
});
