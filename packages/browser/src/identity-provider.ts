import type { Page } from 'puppeteer-core';
import { IntervalFocusGuard, type WindowIdentityProvider } from '@humantype/core';

/** The part of a puppeteer page the provider needs. */
export type IdentifiablePage = Pick<Page, 'url' | 'isClosed'>;

/** Identity reported once the page has been closed. */
export const CLOSED_PAGE_IDENTITY = 'closed:';

/**
 * Identifies the typing target by its page URL. Navigating away, or
 * closing the page, reads as focus lost.
 */
export class PageIdentityProvider implements WindowIdentityProvider {
  constructor(private readonly page: IdentifiablePage) {}

  currentIdentity(): string {
    return this.page.isClosed() ? CLOSED_PAGE_IDENTITY : this.page.url();
  }
}

/** Focus guard that pauses typing when `page` navigates or closes. */
export function createPageFocusGuard(page: IdentifiablePage): IntervalFocusGuard {
  return new IntervalFocusGuard(new PageIdentityProvider(page));
}
