/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Connection description schema and connect-time defaults.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const isPortNumber = (value: number) => Number.isInteger(value) && value >= 1 && value <= 65535;

const PortSchema = z.union([
  z.number().int().min(1).max(65535),
  z
    .string()
    .regex(/^\d{1,5}$/, 'port must be numeric')
    .refine((value) => isPortNumber(Number(value)), 'port must be between 1 and 65535'),
]);

const CredentialSetSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
});

export const ProtocolSchema = z.union([z.literal('http'), z.literal('https')]);

export const ConnectionInfoSchema = z.object({
  host: z.string().min(1).optional(),
  ip: z.string().min(1).optional(),
  port: PortSchema.optional(),
  protocol: ProtocolSchema.optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  credentials: z.record(CredentialSetSchema).optional(),
  sshtunnel: z.record(z.unknown()).optional(),
});

export type Protocol = z.infer<typeof ProtocolSchema>;
export type ConnectionInfo = z.infer<typeof ConnectionInfoSchema>;
export type CredentialSet = z.infer<typeof CredentialSetSchema>;

/** Who is being talked to; used in log lines and error messages. */
export interface DeviceIdentity {
  name: string;
  alias: string;
  via: string;
}

export interface ConnectOptions {
  /** Probe timeout in milliseconds. */
  timeout?: number;
  port?: number | string;
  protocol?: Protocol;
  /** Content type used by GET and DELETE when the call names none. */
  defaultContentType?: string;
  verbose?: boolean;
}

export const CONNECT_DEFAULTS: Required<ConnectOptions> = {
  timeout: 30_000,
  port: 8080,
  protocol: 'http',
  defaultContentType: 'json',
  verbose: false,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

export function parseConnectionInfo(value: unknown): ConnectionInfo {
  const result = ConnectionInfoSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid connection info: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConnectionInfo(configPath: string): ConnectionInfo {
  const absolutePath = path.isAbsolute(configPath) ? configPath : path.join(process.cwd(), configPath);
  const raw = fs.readFileSync(absolutePath, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Connection info at '${absolutePath}' is not valid JSON: ${reason}`);
  }
  return parseConnectionInfo(data);
}
