/**
 * Per-adapter HTTP session: default headers plus a cookie jar filled from
 * Set-Cookie responses. One session per adapter, never shared.
 */

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; question-pool/0.1)';

export class HttpSession {
  private readonly cookies = new Map<string, string>();
  private closed = false;

  constructor(private readonly defaultHeaders: Record<string, string> = {}) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Headers for an outgoing request: defaults, cookies, then per-request headers
   */
  buildHeaders(extra?: RequestInit['headers']): Headers {
    const headers = new Headers({ 'User-Agent': DEFAULT_USER_AGENT, ...this.defaultHeaders });
    if (this.cookies.size > 0) {
      headers.set(
        'Cookie',
        [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join('; ')
      );
    }
    new Headers(extra).forEach((value, name) => headers.set(name, value));
    return headers;
  }

  storeCookies(response: Response): void {
    for (const line of response.headers.getSetCookie()) {
      const pair = line.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  close(): void {
    this.cookies.clear();
    this.closed = true;
  }
}
