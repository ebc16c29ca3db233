/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * device-rest-connector: public API surface.
 */

export const VERSION = '0.1.0';

// Client
export {
  DeviceRestClient,
  DeviceRestClientBuilder,
  CONNECT_EXPECTED_STATUS,
  DEFAULT_EXPECTED_STATUS_CODES,
} from './client';
export type { DeviceRestClientOptions, RequestOptions } from './client';

// Errors
export { DeviceRestError, ConfigurationError, NotConnectedError, UnexpectedStatusError } from './errors';

// Configuration
export {
  ConnectionInfoSchema,
  CONNECT_DEFAULTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  loadConnectionInfo,
  parseConnectionInfo,
} from './config';
export type { ConnectOptions, ConnectionInfo, CredentialSet, DeviceIdentity, Protocol } from './config';

// Collaborators
export { createCredentialResolver, defaultCredentialResolver } from './credentials';
export type { BasicCredentials, CredentialResolver } from './credentials';
export type { TunnelEndpoint, TunnelProvider } from './tunnel';

// Wire format
export { buildBaseUrl, formatIpLiteral, resolveHost } from './address';
export {
  acceptHeader,
  contentTypeHeader,
  formatOf,
  mergeHeaders,
  sniffContentType,
  YANG_COLLECTION,
  YANG_DATA,
  YANG_DATASTORE,
  YANG_OPERATION,
} from './negotiation';
export type { PayloadFormat } from './negotiation';
export { isStructuredPayload, serializePayload, toXml } from './serialization';
export type { Payload, StructuredPayload } from './serialization';

// Infrastructure
export { HookRegistry } from './hooks';
export type {
  AfterResponseCallback,
  BeforeRequestCallback,
  ErrorCallback,
  StateChangeCallback,
  StateSnapshot,
} from './hooks';
export type { DeviceRestExtension } from './extensions';
export { Mutex } from './mutex';
export { createLogger, getLogLevel, setLogLevel, LOG_LEVEL_ENV } from './logger';
export type { LogLevel, Logger } from './logger';

// Adapters
export { BaseAdapter, HttpAdapter, MockAdapter } from './adapters';
export type { HttpAdapterOptions, HttpMethod, SessionFactory, SessionOptions, TransportRequest, TransportResponse } from './adapters';
