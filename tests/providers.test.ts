import { describe, it, expect } from 'vitest';
import { HashingEmbeddingProvider, fnv1a } from '../src/engine/providers/hashing-embeddings.js';
import { EchoTranslator } from '../src/engine/providers/echo.js';
import { CliTranslator } from '../src/engine/providers/cli.js';
import { FatalTranslatorError } from '../src/engine/errors.js';
import { cosineDistance } from '../src/engine/analysis/distance.js';

describe('HashingEmbeddingProvider', () => {
  const provider = new HashingEmbeddingProvider(128);

  it('produces deterministic unit vectors', async () => {
    const first = await provider.embed('The cat sat on the mat');
    const second = await provider.embed('The cat sat on the mat');

    expect(first).toHaveLength(128);
    expect(first).toEqual(second);
    expect(Math.hypot(...first)).toBeCloseTo(1, 12);
  });

  it('ignores case and repeated whitespace', () => {
    expect(provider.embedSync('Hello   World')).toEqual(provider.embedSync('hello world'));
  });

  it('keeps near spellings closer than unrelated text', () => {
    const base = provider.embedSync('the quick brown fox jumps over the lazy dog');
    const typo = provider.embedSync('the quikc brown fox jumps over the lazy dog');
    const other = provider.embedSync('seventeen purple umbrellas waited at the station');

    expect(cosineDistance(base, typo)).toBeLessThan(cosineDistance(base, other));
  });

  it('rejects invalid dimensions', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(
      'Embedding dimensions must be a positive integer, got 0'
    );
  });

  it('hashes with FNV-1a', () => {
    expect(fnv1a('')).toBe(0x811c9dc5);
    expect(fnv1a('a')).toBe(0xe40c292c);
  });
});

describe('EchoTranslator', () => {
  it('tags text with the target language', async () => {
    const response = await new EchoTranslator().translate({ text: 'Hello', sourceLang: 'en', targetLang: 'fr' });

    expect(response.text).toBe('[fr] Hello');
  });
});

describe('CliTranslator', () => {
  it('reports a missing binary as fatal', async () => {
    const translator = new CliTranslator({ name: 'ghost', command: 'drift-lab-missing-binary' });

    await expect(
      translator.translate({ text: 'Hello', sourceLang: 'en', targetLang: 'fr' })
    ).rejects.toThrow(FatalTranslatorError);
  });
});
