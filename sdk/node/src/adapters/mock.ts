/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * In-process session transport for tests.
 */

import { BaseAdapter, HttpMethod, TransportRequest, TransportResponse } from './base';

type MockOutcome = { response: TransportResponse } | { error: Error };

export class MockAdapter extends BaseAdapter {
  private readonly outcomes = new Map<string, MockOutcome>();
  private readonly sent: TransportRequest[] = [];
  private closeError?: Error;
  private open = true;
  private closes = 0;

  /** Add a mocked response keyed by `METHOD /path`. */
  mock(
    method: HttpMethod,
    path: string,
    response: Partial<TransportResponse> & { statusCode: number },
  ): this {
    this.outcomes.set(key(method, path), {
      response: { reason: '', headers: {}, body: '', elapsedMs: 0, ...response },
    });
    return this;
  }

  /** Make `METHOD /path` reject with `error`, as a failing transport would. */
  mockError(method: HttpMethod, path: string, error: Error): this {
    this.outcomes.set(key(method, path), { error });
    return this;
  }

  /** Make the next `close()` throw. */
  failOnClose(error: Error): this {
    this.closeError = error;
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.sent.push(request);
    const outcome = this.outcomes.get(key(request.method, request.path));
    if (!outcome) {
      return { statusCode: 404, reason: 'Not Found', headers: {}, body: 'not mocked', elapsedMs: 0 };
    }
    if ('error' in outcome) throw outcome.error;
    return outcome.response;
  }

  close(): void {
    this.closes += 1;
    this.open = false;
    const error = this.closeError;
    if (error) {
      this.closeError = undefined;
      throw error;
    }
  }

  get isOpen(): boolean {
    return this.open;
  }

  /** All requests that have been sent through this adapter. */
  get sentRequests(): TransportRequest[] {
    return [...this.sent];
  }

  get closeCount(): number {
    return this.closes;
  }
}

const key = (method: string, path: string) => `${method.toUpperCase()} ${path}`;
