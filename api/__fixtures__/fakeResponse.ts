// api/__fixtures__/fakeResponse.ts
// Records what a handler writes to its response.

import type { HttpResponseLike } from '../responses';

export class FakeResponse implements HttpResponseLike {
  statusCode = 0;
  headers: Record<string, string> = {};
  payload: unknown = undefined;

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.payload = body;
    return this;
  }
}
