// Tests for PDF font selection

import { describe, it, expect } from 'vitest';
import { FontFace, loadFontStack, splitRuns } from './fonts.js';

function fakeFace(name: string, covers: (codePoint: number) => boolean): FontFace {
  return { name, data: Buffer.alloc(0), covers };
}

const latin = fakeFace('latin', codePoint => codePoint < 0x100);
const cjk = fakeFace('cjk', codePoint => codePoint >= 0x3000);

function summarize(text: string, faces: FontFace[]): string[] {
  return splitRuns(text, faces).map(run => `${run.face.name}:${run.text}`);
}

describe('splitRuns', () => {
  it('should keep text one face covers in a single run', () => {
    expect(summarize('Acme Retail', [latin, cjk])).toEqual(['latin:Acme Retail']);
  });

  it('should switch faces where coverage changes', () => {
    expect(summarize('Acme 株式会社 Ltd', [latin, cjk])).toEqual(['latin:Acme ', 'cjk:株式会社 ', 'latin:Ltd']);
  });

  it('should fall back to the first face for uncovered characters', () => {
    expect(summarize('aЀb', [latin, cjk])).toEqual(['latin:aЀb']);
  });

  it('should start a run with the face that covers leading whitespace', () => {
    expect(summarize(' 会', [latin, cjk])).toEqual(['latin: ', 'cjk:会']);
  });

  it('should return no runs for empty text', () => {
    expect(splitRuns('', [latin])).toEqual([]);
  });

  it('should reject an empty chain', () => {
    expect(() => splitRuns('a', [])).toThrow('Font chain is empty');
  });
});

describe('loadFontStack', () => {
  it('should cover Latin, accented Latin, arrows and Japanese in the text chains', () => {
    const stack = loadFontStack();
    for (const char of ['A', 'ō', '→', '株']) {
      const codePoint = char.codePointAt(0) ?? 0;
      expect(stack.regular.some(face => face.covers(codePoint))).toBe(true);
      expect(stack.bold.some(face => face.covers(codePoint))).toBe(true);
    }
  });

  it('should put the monospace faces first in the chart chain', () => {
    const stack = loadFontStack();
    expect(stack.mono[0].name.startsWith('roboto-mono-')).toBe(true);
    expect(stack.mono[0].covers('A'.codePointAt(0) ?? 0)).toBe(true);
  });

  it('should load the files once', () => {
    expect(loadFontStack()).toBe(loadFontStack());
  });
});
