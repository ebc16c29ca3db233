/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * SSH tunnel collaborator contract.
 */

import { ConnectionInfo, DeviceIdentity } from './config';

export interface TunnelEndpoint {
  /** Address the tunnel listens on, as an IP literal. */
  ip: string;
  port: number;
}

/**
 * Opens (or reuses) a tunnel for a connection that declares `sshtunnel`.
 * Resolving to `undefined` means no tunnel was set up and the configured
 * host is used directly.
 */
export interface TunnelProvider {
  addTunnel(identity: DeviceIdentity, info: ConnectionInfo): Promise<TunnelEndpoint | undefined>;
}
