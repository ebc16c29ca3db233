/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Connector extension interface.
 */

import { HookRegistry } from './hooks';

/** Plugin that observes or rewrites traffic through lifecycle hooks. */
export interface DeviceRestExtension {
  readonly name: string;
  readonly version: string;

  /**
   * Register callbacks on lifecycle hooks.
   * Called exactly once when the extension is attached via `.use()`.
   */
  install(hooks: HookRegistry): void;
}
