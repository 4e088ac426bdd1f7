/**
 * Scripted page steps
 *
 * A PageMethod is either a named page operation from a fixed dispatch table
 * or a callable receiving the page. Steps run in order after navigation and
 * keep their return value in `result`.
 */

import type { Page } from 'playwright-core';

export const PAGE_METHOD_NAMES = [
  'click',
  'dblclick',
  'fill',
  'press',
  'type',
  'hover',
  'focus',
  'check',
  'uncheck',
  'selectOption',
  'waitForSelector',
  'waitForTimeout',
  'waitForLoadState',
  'waitForURL',
  'waitForFunction',
  'evaluate',
  'screenshot',
  'pdf',
  'setViewportSize',
  'setExtraHTTPHeaders',
  'reload',
  'goBack',
  'goForward',
  'title',
  'content',
  'bringToFront',
  'dispatchEvent',
] as const;

export type PageMethodName = (typeof PAGE_METHOD_NAMES)[number];

type NamedCallMap = {
  [K in PageMethodName]: { name: K; args: Parameters<Page[K]> };
};

export type NamedCall = NamedCallMap[PageMethodName];

type PageOperation =
  | { kind: 'named'; call: NamedCall }
  | { kind: 'callable'; label: string; invoke: (page: Page) => unknown };

const KNOWN_NAMES = new Set<string>(PAGE_METHOD_NAMES);

export function isPageMethodName(name: string): name is PageMethodName {
  return KNOWN_NAMES.has(name);
}

export class PageMethod {
  /** Return value of the step, filled in once it has run */
  result: unknown = undefined;

  private constructor(private readonly operation: PageOperation) {}

  /**
   * A page operation by name, e.g. `PageMethod.named('click', '#submit')`
   */
  static named<K extends PageMethodName>(name: K, ...args: Parameters<Page[K]>): PageMethod {
    return new PageMethod({ kind: 'named', call: namedCall(name, args) });
  }

  /**
   * A function called with the page followed by `args`
   */
  static callable<A extends unknown[]>(fn: (page: Page, ...args: A) => unknown, ...args: A): PageMethod {
    return new PageMethod({
      kind: 'callable',
      label: fn.name || 'anonymous',
      invoke: (page) => fn(page, ...args),
    });
  }

  get name(): string {
    return this.operation.kind === 'named' ? this.operation.call.name : this.operation.label;
  }

  /**
   * False for named steps whose name is not in the dispatch table
   */
  isResolvable(): boolean {
    return this.operation.kind === 'callable' || isPageMethodName(this.operation.call.name);
  }

  /**
   * Run the step against `page` and store its result
   */
  async run(page: Page): Promise<unknown> {
    const operation = this.operation;
    this.result =
      operation.kind === 'callable' ? await operation.invoke(page) : await dispatch(page, operation.call);
    return this.result;
  }

  toString(): string {
    return `<PageMethod for method '${this.name}'>`;
  }
}

function namedCall<K extends PageMethodName>(name: K, args: Parameters<Page[K]>): NamedCallMap[K] {
  return { name, args };
}

function dispatch(page: Page, call: NamedCall): Promise<unknown> {
  switch (call.name) {
    case 'click':
      return page.click(...call.args);
    case 'dblclick':
      return page.dblclick(...call.args);
    case 'fill':
      return page.fill(...call.args);
    case 'press':
      return page.press(...call.args);
    case 'type':
      return page.type(...call.args);
    case 'hover':
      return page.hover(...call.args);
    case 'focus':
      return page.focus(...call.args);
    case 'check':
      return page.check(...call.args);
    case 'uncheck':
      return page.uncheck(...call.args);
    case 'selectOption':
      return page.selectOption(...call.args);
    case 'waitForSelector':
      return page.waitForSelector(...call.args);
    case 'waitForTimeout':
      return page.waitForTimeout(...call.args);
    case 'waitForLoadState':
      return page.waitForLoadState(...call.args);
    case 'waitForURL':
      return page.waitForURL(...call.args);
    case 'waitForFunction':
      return page.waitForFunction(...call.args);
    case 'evaluate':
      return page.evaluate(...call.args);
    case 'screenshot':
      return page.screenshot(...call.args);
    case 'pdf':
      return page.pdf(...call.args);
    case 'setViewportSize':
      return page.setViewportSize(...call.args);
    case 'setExtraHTTPHeaders':
      return page.setExtraHTTPHeaders(...call.args);
    case 'reload':
      return page.reload(...call.args);
    case 'goBack':
      return page.goBack(...call.args);
    case 'goForward':
      return page.goForward(...call.args);
    case 'title':
      return page.title(...call.args);
    case 'content':
      return page.content(...call.args);
    case 'bringToFront':
      return page.bringToFront(...call.args);
    case 'dispatchEvent':
      return page.dispatchEvent(...call.args);
  }
}
