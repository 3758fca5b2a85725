/**
 * @file src/client/sync-worker.ts
 * Worker side of SyncProtocolClient: runs one ProtocolClient and answers
 * calls posted on the transferred port.
 */

import { workerData } from 'node:worker_threads';
import { ProtocolError } from '../protocol/types.js';
import { createLogger } from '../logger/logger.js';
import { ProtocolClient } from './client.js';
import type { SerializedError, SyncCall, SyncReply, SyncWorkerData } from './sync.js';

function isWorkerData(value: unknown): value is SyncWorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'config' in value &&
    'port' in value &&
    'signal' in value &&
    value.signal instanceof Int32Array
  );
}

function serializeError(err: unknown): SerializedError {
  if (err instanceof ProtocolError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      status: err.status,
      retryAfterSeconds: err.retryAfterSeconds,
      details: err.details,
    };
  }
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { name: 'Error', message: String(err) };
}

if (!isWorkerData(workerData)) {
  throw new Error('sync-worker started without its channel');
}

const { config, port, signal, logLevel } = workerData;
const client = new ProtocolClient({ ...config, logger: createLogger({ level: logLevel }) });

// Synchronous throws must reach the reply path as rejections.
async function dispatch(call: SyncCall): Promise<unknown> {
  const [a, b, c, d] = call.args;
  const str = (v: unknown): string => (typeof v === 'string' ? v : String(v));
  const obj = <T extends object>(v: unknown): T | undefined =>
    // Arguments were typed by SyncMethods on the calling thread.
    typeof v === 'object' && v !== null ? (v as T) : undefined;
  const list = (v: unknown): string[] => (Array.isArray(v) ? v.map(str) : []);

  switch (call.method) {
    case 'checkWalletAvailable': return client.checkWalletAvailable();
    case 'getStatus': return client.getStatus();
    case 'requestAuthorization': return client.requestAuthorization(list(a), b === undefined ? undefined : str(b));
    case 'waitForAuthorization': return client.waitForAuthorization(str(a), obj(b));
    case 'connect': return client.connect(list(a), obj(b));
    case 'disconnect': return client.disconnect();
    case 'getWalletInfo': return client.getWalletInfo();
    case 'getBalance': return client.getBalance(a === undefined ? undefined : str(a));
    case 'sendTransaction':
      return client.sendTransaction(str(a), str(b), obj(c), typeof d === 'number' ? d : undefined);
    case 'signMessage': return client.signMessage(str(a));
    case 'addToken': return client.addToken(str(a), obj(b));
    case 'listTokens': return client.listTokens();
    case 'unlockWallet': return client.unlockWallet(str(a));
    case 'lockWallet': return client.lockWallet();
  }
}

port.on('message', (call: SyncCall) => {
  client.restoreState(call.state);
  dispatch(call)
    .then(
      (value): SyncReply => ({ id: call.id, ok: true, value, state: client.getState() }),
      (err: unknown): SyncReply => ({ id: call.id, ok: false, error: serializeError(err), state: client.getState() }),
    )
    .then((reply) => {
      port.postMessage(reply);
      Atomics.store(signal, 0, 1);
      Atomics.notify(signal, 0);
    })
    .catch((err: unknown) => {
      // Reply not cloneable; answer with the error instead.
      port.postMessage({ id: call.id, ok: false, error: serializeError(err), state: client.getState() } satisfies SyncReply);
      Atomics.store(signal, 0, 1);
      Atomics.notify(signal, 0);
    });
});
