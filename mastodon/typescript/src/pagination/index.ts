/**
 * Pagination support for the Mastodon API.
 *
 * Mastodon paginates list endpoints with RFC 8288 Link headers:
 * Link: <https://example.social/api/v1/blocks?max_id=41>; rel="next",
 *       <https://example.social/api/v1/blocks?min_id=57>; rel="prev"
 *
 * Cursors wrap those links. They are opaque to callers, who pass them back
 * verbatim to fetch the neighbouring page.
 *
 * @module pagination
 */

import { InvalidCursorError } from '../errors/index.js';

/**
 * Pagination links extracted from a Link header
 */
export interface PaginationLinks {
  /** URL of the page after this one */
  next?: string;
  /** URL of the page before this one */
  prev?: string;
}

export type CursorDirection = 'next' | 'prev';

/**
 * Opaque page token taken from one Link relation.
 *
 * A cursor is bound to the server origin and endpoint path it came from and
 * is rejected anywhere else.
 */
export class PageCursor {
  readonly direction: CursorDirection;
  private readonly url: URL;

  private constructor(direction: CursorDirection, url: URL) {
    this.direction = direction;
    this.url = url;
  }

  /**
   * Wraps a Link relation target. Returns `undefined` for a target that is
   * not an absolute URL.
   */
  static fromLink(href: string, direction: CursorDirection): PageCursor | undefined {
    let url: URL;
    try {
      url = new URL(href);
    } catch {
      return undefined;
    }
    return new PageCursor(direction, url);
  }

  /**
   * URL to request for this cursor, after checking it belongs to `expected`.
   *
   * @param expected - URL the endpoint would be called at without a cursor
   * @throws InvalidCursorError when the origin or path differ
   */
  resolve(expected: URL): string {
    if (this.url.origin !== expected.origin || this.url.pathname !== expected.pathname) {
      throw new InvalidCursorError(
        `Cursor for ${this.url.origin}${this.url.pathname} cannot be used with ${expected.origin}${expected.pathname}`
      );
    }
    return this.url.toString();
  }

  toString(): string {
    return `PageCursor(${this.direction})`;
  }
}

/**
 * Cursors derived from one response.
 */
export interface PageWindow {
  readonly next?: PageCursor;
  readonly prev?: PageCursor;
}

/**
 * Type for fetching the page a cursor points at
 */
export type PageFetcher<T> = (cursor: PageCursor) => Promise<Page<T>>;

/**
 * Page of results with pagination cursors
 */
export class Page<T> {
  /**
   * Items in the current page
   */
  public readonly items: readonly T[];

  /**
   * Cursor of the following page, absent on the last page
   */
  public readonly next?: PageCursor;

  /**
   * Cursor of the preceding page
   */
  public readonly prev?: PageCursor;

  private readonly fetcher: PageFetcher<T>;

  constructor(items: readonly T[], window: PageWindow, fetcher: PageFetcher<T>) {
    this.items = items;
    this.next = window.next;
    this.prev = window.prev;
    this.fetcher = fetcher;
  }

  /**
   * Check if there is a next page
   */
  hasNext(): boolean {
    return this.next !== undefined;
  }

  /**
   * Check if there is a previous page
   */
  hasPrev(): boolean {
    return this.prev !== undefined;
  }

  /**
   * Fetch the next page
   * @throws InvalidCursorError if there is no next page
   */
  async nextPage(): Promise<Page<T>> {
    if (!this.next) {
      throw new InvalidCursorError('No next page available');
    }
    return this.fetcher(this.next);
  }

  /**
   * Fetch the previous page
   * @throws InvalidCursorError if there is no previous page
   */
  async prevPage(): Promise<Page<T>> {
    if (!this.prev) {
      throw new InvalidCursorError('No previous page available');
    }
    return this.fetcher(this.prev);
  }

  /**
   * Transform page items using a mapping function
   */
  map<U>(fn: (item: T, index: number) => U): Page<U> {
    const mappedFetcher: PageFetcher<U> = async (cursor) => {
      const page = await this.fetcher(cursor);
      return page.map(fn);
    };
    return new Page(this.items.map(fn), this, mappedFetcher);
  }

  /**
   * Get the number of items in this page
   */
  get length(): number {
    return this.items.length;
  }

  /**
   * Check if the page is empty. An empty page may still have a next page.
   */
  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Iterate over all pages starting from this page, stopping when a page
   * has no next cursor
   */
  async *pages(): AsyncIterableIterator<Page<T>> {
    let currentPage: Page<T> | undefined = this;

    while (currentPage) {
      yield currentPage;
      currentPage = currentPage.hasNext() ? await currentPage.nextPage() : undefined;
    }
  }

  /**
   * Iterate over all items starting from this page
   */
  async *allItems(): AsyncIterableIterator<T> {
    for await (const page of this.pages()) {
      yield* page.items;
    }
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this.allItems();
  }

  /**
   * Collect all items from this page onwards into an array
   * WARNING: This will fetch all remaining pages
   */
  async collectAll(): Promise<T[]> {
    const allItems: T[] = [];

    for await (const item of this.allItems()) {
      allItems.push(item);
    }

    return allItems;
  }

  /**
   * Get the first N items from this page onwards, fetching no more pages
   * than needed
   */
  async take(count: number): Promise<T[]> {
    const items: T[] = [];
    if (count <= 0) {
      return items;
    }

    for await (const item of this.allItems()) {
      items.push(item);
      if (items.length >= count) {
        break;
      }
    }

    return items;
  }
}

/**
 * Parse a Link header according to RFC 8288
 *
 * Both `prev` and `previous` are accepted for the backward relation.
 *
 * @param linkHeader - The Link header value
 * @returns Parsed pagination links
 */
export function parseLinkHeader(linkHeader: string | undefined): PaginationLinks {
  const links: PaginationLinks = {};

  if (!linkHeader || linkHeader.trim() === '') {
    return links;
  }

  const parts = linkHeader.split(',').map((part) => part.trim());

  for (const part of parts) {
    // Match pattern: <url>; rel="type"
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);

    if (!match) {
      continue;
    }

    const [, url, rel] = match;

    for (const relation of rel.split(/\s+/)) {
      switch (relation) {
        case 'next':
          links.next = url;
          break;
        case 'prev':
        case 'previous':
          links.prev = url;
          break;
      }
    }
  }

  return links;
}

/**
 * Derive the cursor pair of a response from its Link header.
 */
export function pageWindow(linkHeader: string | undefined): PageWindow {
  const links = parseLinkHeader(linkHeader);
  return {
    next: links.next ? PageCursor.fromLink(links.next, 'next') : undefined,
    prev: links.prev ? PageCursor.fromLink(links.prev, 'prev') : undefined,
  };
}
