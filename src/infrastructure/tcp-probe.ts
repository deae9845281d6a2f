/**
 * TCP reachability probe
 */

import net from 'node:net';
import type { Dependency } from '../domain/types';

export type Probe = (dependency: Dependency, timeoutMs: number) => Promise<boolean>;

/**
 * The part of `net.Socket` a probe drives
 */
export interface ProbeSocket {
  setTimeout(timeoutMs: number): unknown;
  once(event: 'connect' | 'timeout' | 'error', listener: () => void): unknown;
  connect(port: number, host: string): unknown;
  destroy(): unknown;
}

/**
 * Build a probe on top of a socket factory. Each attempt resolves true once the
 * endpoint accepts the connection, false on refusal, DNS failure or timeout, and
 * destroys its socket either way; it never rejects.
 */
export function createTcpProbe(createSocket: () => ProbeSocket = () => new net.Socket()): Probe {
  return (dependency, timeoutMs) =>
    new Promise<boolean>((resolve) => {
      const socket = createSocket();

      const finish = (reachable: boolean): void => {
        socket.destroy();
        resolve(reachable);
      };

      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
      socket.connect(dependency.port, dependency.host);
    });
}

export const tcpProbe: Probe = createTcpProbe();
