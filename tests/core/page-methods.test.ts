import { describe, it, expect } from 'vitest';
import type { Page } from 'playwright-core';
import { isPageMethodName, PageMethod, PAGE_METHOD_NAMES } from '../../src/core/page-methods.js';
import { asPage, FakeBrowserType, type FakePage } from '../fakes/playwright.js';

async function openPage(): Promise<FakePage> {
  const browser = await new FakeBrowserType().launch();
  const context = await browser.newContext();
  return context.newPage();
}

describe('PageMethod', () => {
  describe('named', () => {
    it('should call the page method with its arguments', async () => {
      const page = await openPage();
      const method = PageMethod.named('click', '#submit');

      await method.run(asPage(page));

      expect(page.calls).toEqual([{ name: 'click', args: ['#submit'] }]);
      expect(method.result).toBeUndefined();
    });

    it('should keep the return value', async () => {
      const page = await openPage();
      page.setContent('<html><head><title>Results</title></head></html>');
      const method = PageMethod.named('title');

      const result = await method.run(asPage(page));

      expect(result).toBe('Results');
      expect(method.result).toBe('Results');
    });

    it('should pass functions through to evaluate', async () => {
      const page = await openPage();
      const method = PageMethod.named('evaluate', () => 42);

      await method.run(asPage(page));

      expect(method.result).toBe(42);
    });

    it('should describe itself by name', () => {
      const method = PageMethod.named('waitForTimeout', 500);
      expect(method.name).toBe('waitForTimeout');
      expect(method.toString()).toBe("<PageMethod for method 'waitForTimeout'>");
      expect(method.isResolvable()).toBe(true);
    });

    it('should not resolve names outside the dispatch table', () => {
      // callers without type checking can name anything
      const method = PageMethod.named('launchRocket' as 'click', '#x');
      expect(method.isResolvable()).toBe(false);
    });
  });

  describe('callable', () => {
    it('should call the function with the page and arguments', async () => {
      const page = await openPage();
      async function fillSearch(target: Page, query: string): Promise<string> {
        await target.fill('#q', query);
        return `searched ${query}`;
      }
      const method = PageMethod.callable(fillSearch, 'playwright');

      await method.run(asPage(page));

      expect(page.calls).toEqual([{ name: 'fill', args: ['#q', 'playwright'] }]);
      expect(method.result).toBe('searched playwright');
      expect(method.name).toBe('fillSearch');
    });

    it('should label anonymous functions', () => {
      expect(PageMethod.callable(() => undefined).toString()).toBe("<PageMethod for method 'anonymous'>");
    });
  });

  describe('isPageMethodName', () => {
    it('should know every dispatchable name', () => {
      for (const name of PAGE_METHOD_NAMES) {
        expect(isPageMethodName(name)).toBe(true);
      }
      expect(isPageMethodName('close')).toBe(false);
    });
  });
});
