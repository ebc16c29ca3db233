/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Session transport: base class and data structures.
 */

import { BasicCredentials } from '../credentials';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Outbound request, fully negotiated. `path` is appended verbatim to the base URL. */
export interface TransportRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: string;
  /** Milliseconds. */
  timeout: number;
}

/** Raw device response; decoding `body` is up to the caller. */
export interface TransportResponse {
  statusCode: number;
  reason: string;
  headers: Record<string, string>;
  body: string;
  elapsedMs: number;
}

export interface SessionOptions {
  baseUrl: string;
  auth: BasicCredentials;
}

/** Creates the session a client owns between `connect` and `disconnect`. */
export type SessionFactory = (options: SessionOptions) => BaseAdapter;

/** Abstract base for session transports. One instance per connected client. */
export abstract class BaseAdapter {
  abstract send(request: TransportRequest): Promise<TransportResponse>;
  abstract close(): void;
  abstract get isOpen(): boolean;
}
