/**
 * Enhanced Request Object
 *
 * Wraps the native Request with additional utilities and properties
 * commonly needed in web applications.
 */

import { ValidationError } from './validation.ts';

export interface RequestContext {
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  startTime: number;
}

/**
 * Enhanced Request class
 */
export class AppRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _body: Promise<ArrayBuffer> | null = null;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
      query: this._url.searchParams,
      state: context?.state ?? new Map(),
      startTime: context?.startTime ?? performance.now(),
    };
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  /**
   * HTTP method (GET, POST, etc.)
   */
  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._context.query;
  }

  get params(): Record<string, string> {
    return this._context.params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  get state(): Map<string, unknown> {
    return this._context.state;
  }

  get startTime(): number {
    return this._context.startTime;
  }

  /**
   * Media type without parameters, lower-cased
   */
  get contentType(): string | null {
    const header = this.header('Content-Type');
    if (!header) return null;
    return header.split(';')[0]?.trim().toLowerCase() ?? null;
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      'unknown'
    );
  }

  /**
   * Raw body bytes. The body is read once; later calls reuse it.
   */
  arrayBuffer(): Promise<ArrayBuffer> {
    this._body ??= this._request.arrayBuffer();
    return this._body;
  }

  /**
   * Request body decoded as UTF-8
   */
  async text(): Promise<string> {
    return new TextDecoder().decode(await this.arrayBuffer());
  }

  /**
   * Parse the request body as JSON
   */
  async json(): Promise<unknown> {
    const text = await this.text();
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new ValidationError(
        { body: ['Malformed JSON body'] },
        error instanceof Error ? error.message : 'Malformed JSON body',
      );
    }
  }

  /**
   * Parse the request body as form data (url-encoded or multipart)
   */
  async formData(): Promise<FormData> {
    const rebuilt = new Response(await this.arrayBuffer(), {
      headers: { 'Content-Type': this.header('Content-Type') ?? 'application/x-www-form-urlencoded' },
    });
    return await rebuilt.formData();
  }

  /**
   * Query parameters merged with scalar body fields; the body wins.
   * Files and nested values are ignored.
   */
  async input(): Promise<Record<string, string>> {
    const merged: Record<string, string> = {};
    for (const [key, value] of this.query) {
      merged[key] = value;
    }

    if (!this.hasBody()) {
      return merged;
    }

    const type = this.contentType;
    if (type === 'application/json' || type?.endsWith('+json')) {
      const body = await this.json();
      if (isPlainObject(body)) {
        for (const [key, value] of Object.entries(body)) {
          if (typeof value === 'string') {
            merged[key] = value;
          } else if (typeof value === 'number' || typeof value === 'boolean') {
            merged[key] = String(value);
          }
        }
      }
    } else if (type === 'application/x-www-form-urlencoded' || type === 'multipart/form-data') {
      const form = await this.formData();
      for (const [key, value] of form) {
        if (typeof value === 'string') {
          merged[key] = value;
        }
      }
    }

    return merged;
  }

  /**
   * Set route parameters (used by router)
   */
  setParams(params: Record<string, string>): void {
    this._context.params = params;
  }

  private hasBody(): boolean {
    if (this._request.body === null) return false;
    return this.method !== 'GET' && this.method !== 'HEAD';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
