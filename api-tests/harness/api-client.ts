/**
 * Lightweight HTTP Client for API Tests
 *
 * Dispatches requests straight into the Hono app with app.request().
 * Every method returns the raw Response so tests can assert on
 * status codes, headers, and body independently.
 */

import type { Hono } from 'hono';

export class ApiClient {
  constructor(private app: Hono) {}

  // ---------------------------------------------------------------------------
  // Core request methods
  // ---------------------------------------------------------------------------

  async get(path: string, headers: Record<string, string> = {}): Promise<Response> {
    return this.app.request(path, { headers });
  }

  async post(path: string, body?: unknown): Promise<Response> {
    return this.send('POST', path, body);
  }

  async patch(path: string, body?: unknown): Promise<Response> {
    return this.send('PATCH', path, body);
  }

  async delete(path: string): Promise<Response> {
    return this.app.request(path, { method: 'DELETE' });
  }

  /** POST a raw string body, for malformed JSON checks. */
  async postRaw(path: string, raw: string): Promise<Response> {
    return this.app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: raw,
    });
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    return this.app.request(path, {
      method,
      headers: body !== undefined ? { 'Content-Type': 'application/json' } : {},
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });
  }

  // ---------------------------------------------------------------------------
  // Convenience: parse JSON body
  // ---------------------------------------------------------------------------

  async getJson<T = unknown>(path: string): Promise<{ status: number; body: T }> {
    const res = await this.get(path);
    const body = await res.json() as T;
    return { status: res.status, body };
  }

  async postJson<T = unknown>(path: string, data?: unknown): Promise<{ status: number; body: T }> {
    const res = await this.post(path, data);
    const body = await res.json() as T;
    return { status: res.status, body };
  }

  async patchJson<T = unknown>(path: string, data?: unknown): Promise<{ status: number; body: T }> {
    const res = await this.patch(path, data);
    const body = await res.json() as T;
    return { status: res.status, body };
  }

  async deleteJson<T = unknown>(path: string): Promise<{ status: number; body: T }> {
    const res = await this.delete(path);
    const body = await res.json() as T;
    return { status: res.status, body };
  }
}
