/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Session transports: re-exports.
 */

export { BaseAdapter } from './base';
export type { HttpMethod, SessionFactory, SessionOptions, TransportRequest, TransportResponse } from './base';
export { HttpAdapter } from './http';
export type { HttpAdapterOptions } from './http';
export { MockAdapter } from './mock';
