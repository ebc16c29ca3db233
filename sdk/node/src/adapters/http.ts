/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * HTTP(S) session transport (default), backed by axios.
 */

import axios, { AxiosInstance } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { DeviceRestError } from '../errors';
import { BaseAdapter, SessionOptions, TransportRequest, TransportResponse } from './base';

export interface HttpAdapterOptions extends SessionOptions {
  keepAlive?: boolean;
  maxSockets?: number;
}

export class HttpAdapter extends BaseAdapter {
  readonly baseUrl: string;
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private open = true;

  constructor(options: HttpAdapterOptions) {
    super();
    this.baseUrl = options.baseUrl;
    const agentOptions = {
      keepAlive: options.keepAlive ?? true,
      maxSockets: options.maxSockets ?? 4,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);

    this.client = axios.create({
      auth: { username: options.auth.username, password: options.auth.password },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'text',
      // Bodies go out and come back as raw text; status checks happen in the client.
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (!this.open) {
      throw new DeviceRestError(`Session to '${this.baseUrl}' is closed`);
    }

    const start = performance.now();
    const response = await this.client.request({
      method: request.method,
      url: `${this.baseUrl}${request.path}`,
      headers: request.headers,
      data: request.body,
      timeout: request.timeout,
    });
    const elapsed = performance.now() - start;

    return {
      statusCode: response.status,
      reason: response.statusText,
      headers: normalizeHeaders(response.headers),
      body: typeof response.data === 'string' ? response.data : '',
      elapsedMs: Math.round(elapsed * 100) / 100,
    };
  }

  close(): void {
    this.open = false;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  get isOpen(): boolean {
    return this.open;
  }
}

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key] = value;
    } else if (Array.isArray(value)) {
      normalized[key] = value.join(', ');
    } else if (value !== undefined && value !== null) {
      normalized[key] = String(value);
    }
  }
  return normalized;
}
