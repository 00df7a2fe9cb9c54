import { z } from 'zod';

import type { CoverImage, CoverQuery, MetadataProvider } from '@cloud-narrator/contracts';
import { MetadataError, describeError } from '@cloud-narrator/contracts';
import type { Logger } from '@cloud-narrator/shared-infrastructure';
import { getLogger } from '@cloud-narrator/shared-infrastructure';

import { sniffImageType } from './image.js';

const SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';

// some image hosts refuse requests without a browser user agent
const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/107.0.0.0 Safari/537.36';

export const IMAGE_SIZES = ['xlarge', 'large', 'medium', 'small'] as const;

const SearchResponseSchema = z.object({
  items: z.array(z.object({ link: z.string() })).optional(),
});

export interface GoogleCoverProviderOptions {
  apiKey: string;
  searchEngineId: string;
  /** Results requested per search. */
  resultsPerQuery?: number;
  searchTimeoutMs?: number;
  downloadTimeoutMs?: number;
  fetchImplementation?: typeof fetch;
  logger?: Logger;
}

/** Most specific first: exact phrase with "book cover", then progressively broader. */
export function coverQueries({ title, author }: CoverQuery): string[] {
  const queries = [`"${title}" book cover`, `"${title}"`, `${title} book cover`, title];
  const trimmedAuthor = author?.trim();
  return trimmedAuthor ? [`"${title}" ${trimmedAuthor} book cover`, ...queries] : queries;
}

/** Cover lookup through the Google Custom Search JSON API (image search). */
export class GoogleCoverProvider implements MetadataProvider {
  private readonly fetchImpl: typeof fetch;
  private readonly resultsPerQuery: number;
  private readonly searchTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: GoogleCoverProviderOptions) {
    if (!options.apiKey || !options.searchEngineId) {
      throw new MetadataError('GoogleCoverProvider requires an API key and a search engine id.');
    }
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
    this.resultsPerQuery = options.resultsPerQuery ?? 3;
    this.searchTimeoutMs = options.searchTimeoutMs ?? 10_000;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 6_000;
    this.logger = options.logger ?? getLogger().child({ component: 'cover-search' });
  }

  async lookupCover(query: CoverQuery): Promise<CoverImage> {
    for (const q of coverQueries(query)) {
      for (const size of IMAGE_SIZES) {
        const links = await this.search(q, size);
        for (const link of links) {
          const image = await this.tryDownload(link);
          if (image) return image;
        }
      }
    }
    throw new MetadataError(`No cover image found for "${query.title}"`);
  }

  private async search(q: string, size: (typeof IMAGE_SIZES)[number]): Promise<string[]> {
    const url = new URL(SEARCH_ENDPOINT);
    url.search = new URLSearchParams({
      key: this.options.apiKey,
      cx: this.options.searchEngineId,
      q,
      searchType: 'image',
      num: String(this.resultsPerQuery),
      imgSize: size,
      safe: 'off',
    }).toString();

    this.logger.debug('Searching for cover', { q, size });
    const response = await this.request(url.toString(), this.searchTimeoutMs, {
      Accept: 'application/json',
    }).catch((error: unknown) => {
      throw new MetadataError(`Cover search failed: ${describeError(error)}`, { cause: error });
    });

    if (response.status === 403) {
      throw new MetadataError(
        'Cover search rejected (HTTP 403); the daily Custom Search quota may be exhausted',
      );
    }
    if (!response.ok) {
      throw new MetadataError(`Cover search failed (${response.status} ${response.statusText})`);
    }

    const parsed = SearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new MetadataError('Cover search returned an unexpected payload', { cause: parsed.error });
    }
    return (parsed.data.items ?? []).map((item) => item.link);
  }

  private async tryDownload(link: string): Promise<CoverImage | null> {
    try {
      const response = await this.request(link, this.downloadTimeoutMs, {
        'User-Agent': BROWSER_USER_AGENT,
      });
      if (!response.ok) {
        this.logger.debug('Cover download rejected', { link, status: response.status });
        return null;
      }
      const data = new Uint8Array(await response.arrayBuffer());
      const mimeType = sniffImageType(data);
      if (!mimeType) {
        this.logger.debug('Cover download is not a JPEG or PNG', { link });
        return null;
      }
      return { data, mimeType, sourceUrl: link };
    } catch (error: unknown) {
      this.logger.debug('Cover download failed, trying next result', {
        link,
        error: describeError(error),
      });
      return null;
    }
  }

  private async request(
    url: string,
    timeoutMs: number,
    headers: Record<string, string>,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    timeout.unref?.();
    try {
      return await this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Build a provider from GOOGLE_SEARCH_API_KEY / GOOGLE_SEARCH_ENGINE_ID, or null when unset. */
export function createCoverProviderFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<GoogleCoverProviderOptions> = {},
): GoogleCoverProvider | null {
  const apiKey = env.GOOGLE_SEARCH_API_KEY?.trim();
  const searchEngineId = env.GOOGLE_SEARCH_ENGINE_ID?.trim();
  if (!apiKey || !searchEngineId) return null;
  return new GoogleCoverProvider({ ...overrides, apiKey, searchEngineId });
}
