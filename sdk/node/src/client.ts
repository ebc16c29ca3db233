/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Device REST client & builder.
 */

import { BaseAdapter, HttpMethod, SessionFactory, TransportRequest, TransportResponse } from './adapters/base';
import { HttpAdapter } from './adapters/http';
import { buildBaseUrl, formatIpLiteral, resolveHost } from './address';
import {
  CONNECT_DEFAULTS,
  ConnectOptions,
  ConnectionInfo,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DeviceIdentity,
  parseConnectionInfo,
} from './config';
import { CredentialResolver, defaultCredentialResolver } from './credentials';
import { asError, ConfigurationError, NotConnectedError, UnexpectedStatusError } from './errors';
import { DeviceRestExtension } from './extensions';
import { HookRegistry } from './hooks';
import { createLogger } from './logger';
import { Mutex } from './mutex';
import { acceptHeader, contentTypeHeader, mergeHeaders, sniffContentType } from './negotiation';
import { Payload, serializePayload } from './serialization';
import { TunnelProvider } from './tunnel';

const log = createLogger('DeviceRestClient');

/** Status the login probe must return. */
export const CONNECT_EXPECTED_STATUS = 200;

export const DEFAULT_EXPECTED_STATUS_CODES: Readonly<Record<HttpMethod, readonly number[]>> = {
  GET: [204, 200],
  POST: [201, 204, 200],
  PUT: [201, 204, 200],
  PATCH: [201, 204, 200],
  DELETE: [201, 204, 200],
};

export interface RequestOptions {
  /** `json`, `xml`, or a literal media type. */
  contentType?: string;
  /** Applied last; overrides negotiated headers of the same name. */
  headers?: Record<string, string>;
  expectedStatusCodes?: readonly number[];
  /** Milliseconds. */
  timeout?: number;
  /** Log payloads and response bodies at info level. */
  verbose?: boolean;
}

export interface DeviceRestClientOptions {
  /** Device name, as used in log lines and errors. */
  device: string;
  /** Connection alias. Defaults to `rest`. */
  alias?: string;
  /** Name of the connection entry. Defaults to the alias. */
  via?: string;
  /** Validated with {@link parseConnectionInfo}. */
  connection: unknown;
  credentials?: CredentialResolver;
  tunnel?: TunnelProvider;
  sessionFactory?: SessionFactory;
  /** Sent with every request, underneath the negotiated headers. */
  headers?: Record<string, string>;
}

const defaultSessionFactory: SessionFactory = (options) => new HttpAdapter(options);

// ---------------------------------------------------------------------------
// DeviceRestClient
// ---------------------------------------------------------------------------

export class DeviceRestClient {
  readonly hooks: HookRegistry;
  readonly identity: DeviceIdentity;
  private readonly info: ConnectionInfo;
  private readonly resolveCredentials: CredentialResolver;
  private readonly tunnel?: TunnelProvider;
  private readonly sessionFactory: SessionFactory;
  private readonly baseHeaders: Record<string, string>;
  private readonly mutex = new Mutex();
  private readonly extensions: DeviceRestExtension[] = [];

  private session?: BaseAdapter;
  private _baseUrl?: string;
  private defaultContentType: string = CONNECT_DEFAULTS.defaultContentType;
  private _connected = false;

  constructor(options: DeviceRestClientOptions) {
    if (!options.device) {
      throw new ConfigurationError('DeviceRestClient requires a device name.');
    }
    const alias = options.alias ?? 'rest';
    this.identity = { name: options.device, alias, via: options.via ?? alias };
    this.info = parseConnectionInfo(options.connection);
    this.resolveCredentials = options.credentials ?? defaultCredentialResolver;
    this.tunnel = options.tunnel;
    this.sessionFactory = options.sessionFactory ?? defaultSessionFactory;
    this.baseHeaders = { ...options.headers };
    this.hooks = new HookRegistry();
  }

  /** Register an extension plugin. Returns `this` for chaining. */
  use(extension: DeviceRestExtension): this {
    extension.install(this.hooks);
    this.extensions.push(extension);
    return this;
  }

  get connected(): boolean {
    return this._connected;
  }

  /** `{protocol}://{host}:{port}` of the current session. */
  get baseUrl(): string | undefined {
    return this._baseUrl;
  }

  get installedExtensions(): readonly DeviceRestExtension[] {
    return this.extensions;
  }

  // -- Lifecycle -----------------------------------------------------------

  /**
   * Open a session and probe `{base}/api` with basic auth.
   *
   * Port and protocol declared on the connection take precedence over the
   * arguments. Resolves with the probe response, or `undefined` when the
   * client was already connected.
   */
  async connect(options: ConnectOptions = {}): Promise<TransportResponse | undefined> {
    return this.mutex.runExclusive(async () => {
      if (this._connected) return undefined;

      const timeout = options.timeout ?? CONNECT_DEFAULTS.timeout;
      const contentType = options.defaultContentType ?? CONNECT_DEFAULTS.defaultContentType;
      log.debug(`Content type: ${contentType}`);
      log.debug(`Timeout: ${timeout}`);

      const target = await this.resolveTarget(options.port ?? CONNECT_DEFAULTS.port);
      const protocol = this.info.protocol ?? options.protocol ?? CONNECT_DEFAULTS.protocol;
      const baseUrl = buildBaseUrl(protocol, target.host, target.port);

      log.info(`Connecting to '${this.identity.name}' with alias '${this.identity.alias}'`);

      const auth = await this.resolveCredentials(this.info, this.identity);
      const session = this.sessionFactory({ baseUrl, auth });

      let response: TransportResponse;
      try {
        response = await this.dispatch(session, {
          method: 'GET',
          path: '/api',
          headers: mergeHeaders(this.baseHeaders),
          timeout,
        });
        this.logResponse(response, options.verbose ?? false);

        if (response.statusCode !== CONNECT_EXPECTED_STATUS) {
          throw new UnexpectedStatusError(
            `Connection to '${target.host}:${target.port}' has returned the following code ` +
              `'${response.statusCode}', instead of the expected status code '${CONNECT_EXPECTED_STATUS}'`,
            this.identity.name,
            response.statusCode,
            [CONNECT_EXPECTED_STATUS],
            response.body,
          );
        }
      } catch (e) {
        this.discardSession(session);
        this.hooks.fireError(asError(e), this.identity);
        throw e;
      }

      this.session = session;
      this._baseUrl = baseUrl;
      this.defaultContentType = contentType;
      this._connected = true;
      log.info(`Connected successfully to '${this.identity.name}'`);
      this.hooks.fireStateChange({ device: this.identity, connected: true, baseUrl });
      return response;
    });
  }

  /** Close the session. The client ends up disconnected even when closing fails. */
  async disconnect(): Promise<void> {
    return this.mutex.runExclusive(() => {
      log.info(`Disconnecting from '${this.identity.name}' with alias '${this.identity.alias}'`);
      const session = this.session;
      const wasConnected = this._connected;
      try {
        session?.close();
      } finally {
        this.session = undefined;
        this._baseUrl = undefined;
        this._connected = false;
        if (wasConnected) {
          this.hooks.fireStateChange({ device: this.identity, connected: false });
        }
      }
      log.info(`Disconnected successfully from '${this.identity.name}'`);
    });
  }

  // -- Requests ------------------------------------------------------------

  /** Retrieve data. Accept follows `contentType`, else the connect-time default. */
  async get(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.mutex.runExclusive(() => this.readRequest('GET', path, options));
  }

  async delete(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.mutex.runExclusive(() => this.readRequest('DELETE', path, options));
  }

  /**
   * Create a resource or invoke an operation. Without `contentType` the
   * payload decides: text starting with `<` is XML, anything else JSON.
   */
  async post(path: string, payload: Payload = '', options: RequestOptions = {}): Promise<TransportResponse> {
    return this.mutex.runExclusive(() => this.writeRequest('POST', path, payload, options));
  }

  async put(path: string, payload: Payload = '', options: RequestOptions = {}): Promise<TransportResponse> {
    return this.mutex.runExclusive(() => this.writeRequest('PUT', path, payload, options));
  }

  async patch(path: string, payload: Payload = '', options: RequestOptions = {}): Promise<TransportResponse> {
    return this.mutex.runExclusive(() => this.writeRequest('PATCH', path, payload, options));
  }

  // -- Internals -----------------------------------------------------------

  private async readRequest(method: 'GET' | 'DELETE', path: string, options: RequestOptions): Promise<TransportResponse> {
    return this.guarded(async (session) => {
      const contentType = options.contentType ?? this.defaultContentType;
      const headers = mergeHeaders(this.baseHeaders, { Accept: acceptHeader(contentType) }, options.headers);
      return this.execute(session, { method, path, headers, timeout: options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS }, options);
    });
  }

  private async writeRequest(
    method: 'POST' | 'PUT' | 'PATCH',
    path: string,
    payload: Payload,
    options: RequestOptions,
  ): Promise<TransportResponse> {
    return this.guarded(async (session) => {
      const body = serializePayload(payload, options.contentType);
      const contentType = options.contentType ?? sniffContentType(body);
      const negotiated = {
        'Content-type': contentTypeHeader(path, contentType),
        Accept: acceptHeader(contentType),
      };
      const headers = mergeHeaders(this.baseHeaders, negotiated, options.headers);
      return this.execute(
        session,
        { method, path, headers, body, timeout: options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS },
        options,
      );
    });
  }

  /** Fails fast when disconnected and reports every failure to the error hooks. */
  private async guarded(run: (session: BaseAdapter) => Promise<TransportResponse>): Promise<TransportResponse> {
    try {
      const session = this.session;
      if (!this._connected || !session) {
        throw new NotConnectedError(this.identity.name, this.identity.alias);
      }
      return await run(session);
    } catch (e) {
      this.hooks.fireError(asError(e), this.identity);
      throw e;
    }
  }

  private async execute(session: BaseAdapter, request: TransportRequest, options: RequestOptions): Promise<TransportResponse> {
    const verbose = options.verbose ?? false;
    log.debug(`Sending ${request.method} command to '${this.identity.name}': ${this._baseUrl ?? ''}${request.path}`, {
      headers: request.headers,
    });
    if (verbose && request.body !== undefined) {
      log.info(`Request payload:\n${request.body}`);
    }

    const response = await this.dispatch(session, request);
    this.logResponse(response, verbose);

    const expected = options.expectedStatusCodes ?? DEFAULT_EXPECTED_STATUS_CODES[request.method];
    if (!expected.includes(response.statusCode)) {
      throw UnexpectedStatusError.forResponse(this.identity.name, response.statusCode, expected, response.body);
    }
    return response;
  }

  private async dispatch(session: BaseAdapter, request: TransportRequest): Promise<TransportResponse> {
    const outgoing = await this.hooks.fireBeforeRequest(request, this.identity);
    const response = await session.send(outgoing);
    this.hooks.fireAfterResponse(response, outgoing, this.identity);
    return response;
  }

  private logResponse(response: TransportResponse, verbose: boolean): void {
    log.debug(`Response: ${response.statusCode} ${response.reason}`, { headers: response.headers });
    if (verbose) {
      log.info(`Output received:\n${response.body}`);
    }
  }

  private async resolveTarget(port: number | string): Promise<{ host: string; port: number | string }> {
    if (this.info.sshtunnel) {
      if (!this.tunnel) {
        throw new ConfigurationError(
          `Connection '${this.identity.via}' of '${this.identity.name}' declares sshtunnel but no tunnel provider was given`,
        );
      }
      const endpoint = await this.tunnel.addTunnel(this.identity, this.info);
      if (endpoint) {
        return { host: formatIpLiteral(endpoint.ip), port: endpoint.port };
      }
    }
    return { host: resolveHost(this.info), port: this.info.port ?? port };
  }

  /** Close a session that never became current; its close error must not mask the connect failure. */
  private discardSession(session: BaseAdapter): void {
    try {
      session.close();
    } catch (e) {
      log.warn(`Closing the failed session to '${this.identity.name}' threw`, { error: asError(e).message });
    }
  }
}

// ---------------------------------------------------------------------------
// DeviceRestClientBuilder
// ---------------------------------------------------------------------------

export class DeviceRestClientBuilder {
  private _device?: string;
  private _alias?: string;
  private _via?: string;
  private _connection?: unknown;
  private _credentials?: CredentialResolver;
  private _tunnel?: TunnelProvider;
  private _sessionFactory?: SessionFactory;
  private _headers: Record<string, string> = {};
  private _extensions: DeviceRestExtension[] = [];

  setDevice(name: string, alias?: string): this {
    this._device = name;
    this._alias = alias;
    return this;
  }

  setVia(via: string): this {
    this._via = via;
    return this;
  }

  setConnection(connection: unknown): this {
    this._connection = connection;
    return this;
  }

  setCredentialResolver(resolver: CredentialResolver): this {
    this._credentials = resolver;
    return this;
  }

  setTunnelProvider(provider: TunnelProvider): this {
    this._tunnel = provider;
    return this;
  }

  setTransport(factory: SessionFactory): this {
    this._sessionFactory = factory;
    return this;
  }

  setHeader(name: string, value: string): this {
    this._headers = mergeHeaders(this._headers, { [name]: value });
    return this;
  }

  use(extension: DeviceRestExtension): this {
    this._extensions.push(extension);
    return this;
  }

  build(): DeviceRestClient {
    if (!this._device) {
      throw new ConfigurationError('DeviceRestClientBuilder.build() requires setDevice().');
    }
    if (this._connection === undefined) {
      throw new ConfigurationError('DeviceRestClientBuilder.build() requires setConnection().');
    }

    const client = new DeviceRestClient({
      device: this._device,
      alias: this._alias,
      via: this._via,
      connection: this._connection,
      credentials: this._credentials,
      tunnel: this._tunnel,
      sessionFactory: this._sessionFactory,
      headers: this._headers,
    });

    for (const ext of this._extensions) {
      client.use(ext);
    }
    return client;
  }
}
