/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Connection lifecycle hook registry.
 */

import { TransportRequest, TransportResponse } from './adapters/base';
import { DeviceIdentity } from './config';
import { asError } from './errors';
import { createLogger } from './logger';

const log = createLogger('HookRegistry');

// ---------------------------------------------------------------------------
// Data structures
// ---------------------------------------------------------------------------

export interface StateSnapshot {
  device: DeviceIdentity;
  connected: boolean;
  baseUrl?: string;
}

// ---------------------------------------------------------------------------
// Callback types
// ---------------------------------------------------------------------------

export type BeforeRequestCallback = (
  req: TransportRequest,
  device: DeviceIdentity,
) => TransportRequest | Promise<TransportRequest>;
export type AfterResponseCallback = (res: TransportResponse, req: TransportRequest, device: DeviceIdentity) => void;
export type StateChangeCallback = (state: StateSnapshot) => void;
export type ErrorCallback = (err: Error, device: DeviceIdentity) => void;

// ---------------------------------------------------------------------------
// HookRegistry
// ---------------------------------------------------------------------------

export class HookRegistry {
  private beforeRequestCallbacks: BeforeRequestCallback[] = [];
  private afterResponseCallbacks: AfterResponseCallback[] = [];
  private stateChangeCallbacks: StateChangeCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];

  // -- Registration --------------------------------------------------------

  onBeforeRequest(cb: BeforeRequestCallback): void {
    this.beforeRequestCallbacks.push(cb);
  }

  onAfterResponse(cb: AfterResponseCallback): void {
    this.afterResponseCallbacks.push(cb);
  }

  onStateChange(cb: StateChangeCallback): void {
    this.stateChangeCallbacks.push(cb);
  }

  onError(cb: ErrorCallback): void {
    this.errorCallbacks.push(cb);
  }

  // -- Firing --------------------------------------------------------------

  /** Each callback sees the previous one's result; a throwing callback is skipped. */
  async fireBeforeRequest(request: TransportRequest, device: DeviceIdentity): Promise<TransportRequest> {
    let current = request;
    for (const cb of this.beforeRequestCallbacks) {
      try { current = await cb(current, device); } catch (e) { this.fireError(asError(e), device); }
    }
    return current;
  }

  fireAfterResponse(response: TransportResponse, request: TransportRequest, device: DeviceIdentity): void {
    for (const cb of this.afterResponseCallbacks) {
      try { cb(response, request, device); } catch (e) { this.fireError(asError(e), device); }
    }
  }

  fireStateChange(state: StateSnapshot): void {
    for (const cb of this.stateChangeCallbacks) {
      try { cb(state); } catch (e) { this.fireError(asError(e), state.device); }
    }
  }

  fireError(error: Error, device: DeviceIdentity): void {
    for (const cb of this.errorCallbacks) {
      try {
        cb(error, device);
      } catch (e) {
        // Not re-dispatched to the error hooks, which would recurse.
        log.warn('Error hook threw', { device: device.name, error: asError(e).message });
      }
    }
  }
}
