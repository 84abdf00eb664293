/**
 * Response Builder
 *
 * Fluent construction of the JSON and plain-text responses handlers return.
 */

/**
 * Response builder
 */
export class AppResponse {
  private _status = 200;
  private _headers = new Headers();

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): Response {
    return this.send('application/json; charset=utf-8', JSON.stringify(data));
  }

  text(content: string): Response {
    return this.send('text/plain; charset=utf-8', content);
  }

  private send(contentType: string, body: string): Response {
    this._headers.set('Content-Type', contentType);
    return new Response(body, { status: this._status, headers: new Headers(this._headers) });
  }
}
