/**
 * Case-insensitive header collection shared between the caller's request,
 * the header policies and the built responses. Names are stored lowercased,
 * the way Playwright reports them.
 */

export type HeaderInit = Record<string, string> | Iterable<readonly [string, string]>;

export class HeaderMap implements Iterable<[string, string]> {
  private readonly values = new Map<string, string>();

  constructor(init?: HeaderInit) {
    if (init) {
      this.update(init);
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase());
  }

  set(name: string, value: string): void {
    this.values.set(name.toLowerCase(), value);
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    return this.values.delete(name.toLowerCase());
  }

  clear(): void {
    this.values.clear();
  }

  /**
   * Set every header from `init`, replacing existing values of the same name
   */
  update(init: HeaderInit): void {
    const entries = isIterable(init) ? init : Object.entries(init);
    for (const [name, value] of entries) {
      this.set(name, value);
    }
  }

  get size(): number {
    return this.values.size;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.values.entries();
  }
}

function isIterable(value: HeaderInit): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
