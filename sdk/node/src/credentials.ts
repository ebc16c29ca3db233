/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Credential resolution for basic authentication.
 */

import { ConnectionInfo, DeviceIdentity } from './config';
import { ConfigurationError } from './errors';

export interface BasicCredentials {
  username: string;
  password: string;
}

export type CredentialResolver = (
  info: ConnectionInfo,
  identity: DeviceIdentity,
) => BasicCredentials | Promise<BasicCredentials>;

/**
 * Looks up `credentials[key]`, then `credentials.default`, then the
 * top-level `username`/`password` pair of the connection.
 */
export function createCredentialResolver(key = 'rest'): CredentialResolver {
  return (info, identity) => {
    const candidates = [info.credentials?.[key], info.credentials?.default, info];
    for (const candidate of candidates) {
      const username = candidate?.username;
      const password = candidate?.password;
      if (username !== undefined && password !== undefined) {
        return { username, password };
      }
    }
    throw new ConfigurationError(
      `No username/password found for '${identity.name}' connection '${identity.via}'`,
    );
  };
}

export const defaultCredentialResolver: CredentialResolver = createCredentialResolver();
