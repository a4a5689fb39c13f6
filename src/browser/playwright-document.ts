// ============================================================================
// PLAYWRIGHT DOCUMENT — RenderedDocument over a Playwright page
// ============================================================================

import type { ElementHandle, Page } from "playwright-core";

import type { RenderedDocument, Serializable } from "./types";
import type { ElementLocator } from "./locator";
import { toPlaywrightSelector } from "./locator";
import { buildInvocation } from "./invocation";

export type PlaywrightElement = ElementHandle<SVGElement | HTMLElement>;

/** Errors Playwright raises once a handle no longer points into a live document. */
export function isDetachedError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return /not attached to the DOM|Element is not attached|has been disposed|Execution context was destroyed|Target (page, context or browser )?(has been )?closed/i.test(message);
}

export class PlaywrightDocument implements RenderedDocument<PlaywrightElement> {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async resolve(locator: ElementLocator): Promise<PlaywrightElement | null> {
    try {
      return await this.page.$(toPlaywrightSelector(locator));
    } catch (error) {
      if (isDetachedError(error)) return null;
      throw error;
    }
  }

  async readText(element: PlaywrightElement): Promise<string | null> {
    try {
      return await element.evaluate((el) => {
        if (!el.isConnected) return null;
        return el instanceof HTMLElement ? el.innerText : (el.textContent ?? "");
      });
    } catch (error) {
      if (isDetachedError(error)) return null;
      throw error;
    }
  }

  executeInContext(script: string, args: readonly Serializable[]): Promise<unknown> {
    return this.page.evaluate<unknown>(buildInvocation(script, args));
  }
}
