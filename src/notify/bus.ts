/**
 * @file src/notify/bus.ts
 *
 * NotificationBus: fan-out of wallet events to connected push listeners
 * (wallet UIs on the /ws/v1 channel).
 *
 * Delivery is best effort: a connection that is not open, whose send throws,
 * or whose send callback reports an error is dropped from the set. Nothing is
 * queued or retried.
 */

import type { AuthorizationRequestBody, RequestStatus } from '../protocol/types.js';
import type { Logger } from '../logger/logger.js';

// ── Events ────────────────────────────────────────────────────────────────────

export type PushEvent =
  | { type: 'authorization_request'; request: AuthorizationRequestBody }
  | { type: 'authorization_resolved'; request_id: string; status: Exclude<RequestStatus, 'pending'> }
  | { type: 'pending_requests'; requests: AuthorizationRequestBody[] }
  | { type: 'wallet_locked'; reason: 'manual' | 'auto_lock' }
  | { type: 'wallet_unlocked' }
  | { type: 'session_revoked'; app_name: string }
  | { type: 'server_shutdown' };

export type PushEventType = PushEvent['type'];

// ── Connections ───────────────────────────────────────────────────────────────

/** The subset of a `ws` WebSocket the bus relies on. */
export interface PushConnection {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

const OPEN = 1;

export class NotificationBus {
  private readonly connections = new Set<PushConnection>();

  constructor(private readonly logger?: Logger) { }

  add(connection: PushConnection): void {
    this.connections.add(connection);
  }

  remove(connection: PushConnection): boolean {
    return this.connections.delete(connection);
  }

  get size(): number {
    return this.connections.size;
  }

  /** Sends one event to every open connection. Returns how many sends were issued. */
  broadcast(event: PushEvent): number {
    const payload = JSON.stringify(event);
    let delivered = 0;
    for (const connection of [...this.connections]) {
      if (this.send(connection, payload)) delivered++;
    }
    this.logger?.debug({ event: event.type, delivered, listeners: this.connections.size }, 'Push event broadcast');
    return delivered;
  }

  /** Sends one event to a single connection, e.g. the snapshot on connect. */
  sendTo(connection: PushConnection, event: PushEvent): boolean {
    return this.send(connection, JSON.stringify(event));
  }

  closeAll(code = 1001, reason = 'server shutting down'): void {
    for (const connection of this.connections) {
      try {
        connection.close(code, reason);
      } catch (err) {
        this.logger?.debug({ err }, 'Push connection close failed');
      }
    }
    this.connections.clear();
  }

  private send(connection: PushConnection, payload: string): boolean {
    if (connection.readyState !== OPEN) {
      this.connections.delete(connection);
      return false;
    }
    try {
      connection.send(payload, (err) => {
        if (err) {
          this.logger?.debug({ err }, 'Push delivery failed; dropping listener');
          this.connections.delete(connection);
        }
      });
      return true;
    } catch (err) {
      this.logger?.debug({ err }, 'Push send threw; dropping listener');
      this.connections.delete(connection);
      return false;
    }
  }
}
