import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MetadataError } from '@cloud-narrator/contracts';

import {
  GoogleCoverProvider,
  coverQueries,
  createCoverProviderFromEnv,
} from '../src/cover-search.js';

const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('GoogleCoverProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  const provider = () =>
    new GoogleCoverProvider({
      apiKey: 'test-key',
      searchEngineId: 'test-cx',
      fetchImplementation: fetchMock,
    });

  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('returns the first result that downloads as an image', async () => {
    fetchMock
      .mockResolvedValueOnce(
        json({ items: [{ link: 'https://img.test/a.jpg' }, { link: 'https://img.test/b.jpg' }] }),
      )
      .mockResolvedValueOnce(new Response('missing', { status: 404 }))
      .mockResolvedValueOnce(new Response(JPEG));

    const cover = await provider().lookupCover({ title: 'Dune' });

    expect(cover.mimeType).toBe('image/jpeg');
    expect(cover.sourceUrl).toBe('https://img.test/b.jpg');
    expect(Array.from(cover.data)).toEqual(Array.from(JPEG));
    expect(fetchMock).toHaveBeenCalledTimes(3);

    const searchUrl = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(searchUrl.origin + searchUrl.pathname).toBe('https://www.googleapis.com/customsearch/v1');
    expect(Object.fromEntries(searchUrl.searchParams)).toEqual({
      key: 'test-key',
      cx: 'test-cx',
      q: '"Dune" book cover',
      searchType: 'image',
      num: '3',
      imgSize: 'xlarge',
      safe: 'off',
    });
  });

  it('skips downloads that are not JPEG or PNG', async () => {
    fetchMock
      .mockResolvedValueOnce(
        json({ items: [{ link: 'https://img.test/page.html' }, { link: 'https://img.test/c.jpg' }] }),
      )
      .mockResolvedValueOnce(new Response('<html></html>'))
      .mockResolvedValueOnce(new Response(JPEG));

    const cover = await provider().lookupCover({ title: 'Dune' });

    expect(cover.sourceUrl).toBe('https://img.test/c.jpg');
  });

  it('stops searching on HTTP 403', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: { code: 403 } }, 403));

    const error = await provider()
      .lookupCover({ title: 'Dune' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MetadataError);
    expect(String(error)).toContain('quota');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('tries every query and size before giving up', async () => {
    fetchMock.mockImplementation(async () => json({}));

    await expect(provider().lookupCover({ title: 'Dune' })).rejects.toThrow(
      'No cover image found for "Dune"',
    );
    expect(fetchMock).toHaveBeenCalledTimes(16);
    const lastUrl = new URL(String(fetchMock.mock.calls[15]?.[0]));
    expect(lastUrl.searchParams.get('q')).toBe('Dune');
    expect(lastUrl.searchParams.get('imgSize')).toBe('small');
  });

  it('wraps network failures of the search itself', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(provider().lookupCover({ title: 'Dune' })).rejects.toThrow(
      'Cover search failed: fetch failed',
    );
  });
});

describe('coverQueries', () => {
  it('goes from exact phrase to broad search', () => {
    expect(coverQueries({ title: 'Dune' })).toEqual([
      '"Dune" book cover',
      '"Dune"',
      'Dune book cover',
      'Dune',
    ]);
  });

  it('starts with the author when one is known', () => {
    expect(coverQueries({ title: 'Dune', author: 'Frank Herbert' })[0]).toBe(
      '"Dune" Frank Herbert book cover',
    );
  });
});

describe('createCoverProviderFromEnv', () => {
  it('returns null without credentials', () => {
    expect(createCoverProviderFromEnv({ GOOGLE_SEARCH_API_KEY: 'test-key' })).toBeNull();
  });

  it('builds a provider when both credentials are set', () => {
    const created = createCoverProviderFromEnv({
      GOOGLE_SEARCH_API_KEY: 'test-key',
      GOOGLE_SEARCH_ENGINE_ID: 'test-cx',
    });
    expect(created).toBeInstanceOf(GoogleCoverProvider);
  });
});
