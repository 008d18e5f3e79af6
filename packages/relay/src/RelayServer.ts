/**
 * @fileoverview Factory function to create the mock simulator TCP server.
 *
 * Encapsulates:
 * - TCP server setup
 * - Socket to {@link Connection} adaptation
 * - Graceful shutdown
 */

import { createServer, type Socket } from 'node:net';
import { createLogger, DEFAULT_SIMULATOR_PORT, type Logger } from '@shot-relay/shared';
import {
  type Connection,
  type RelayEvents,
  RelayRuntime,
  type RelayRuntimeConfig,
} from './RelayRuntime.js';

export interface RelayServerConfig extends RelayRuntimeConfig {
  /** Interface to bind (default: 0.0.0.0) */
  readonly host?: string;
  /** Port to listen on; 0 picks a free port (default: 921) */
  readonly port?: number;
}

/**
 * Running relay server instance.
 */
export interface RelayServer {
  readonly runtime: RelayRuntime;
  /** Port the server is listening on */
  readonly port: number;
  /** Disconnect every client and stop listening */
  stop(): Promise<void>;
}

function createSocketConnection(id: string, socket: Socket): Connection {
  return {
    id,
    send(data: string): void {
      socket.write(data);
    },
    close(): void {
      socket.destroy();
    },
    get isOpen(): boolean {
      return !socket.destroyed && socket.writable;
    },
  };
}

/**
 * Create and start a relay server.
 *
 * @example
 * ```typescript
 * const server = await createRelayServer({
 *   port: 921,
 *   player: { Handed: 'RH', Club: 'DR', DistanceToTarget: 250 },
 * });
 *
 * // Later: graceful shutdown
 * await server.stop();
 * ```
 */
export function createRelayServer(
  config: RelayServerConfig,
  events: RelayEvents = {}
): Promise<RelayServer> {
  const logger: Logger = config.logger ?? createLogger('relay');
  const runtime = new RelayRuntime({ ...config, logger }, events);
  let nextConnectionNumber = 1;

  const server = createServer((socket) => {
    socket.setNoDelay(true);

    const conn = createSocketConnection(`conn-${nextConnectionNumber++}`, socket);
    runtime.handleConnection(conn);

    socket.on('data', (data: Buffer) => {
      void runtime.handleData(conn, data);
    });

    socket.on('close', () => {
      runtime.handleDisconnection(conn);
    });

    socket.on('error', (error) => {
      logger.warn('Socket error', { connectionId: conn.id, error: error.message });
    });
  });

  const stop = (): Promise<void> => {
    logger.info('Shutting down...');
    runtime.closeAll();
    return new Promise((resolve) => {
      server.close(() => {
        logger.info('Relay server stopped');
        resolve();
      });
    });
  };

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port ?? DEFAULT_SIMULATOR_PORT, config.host ?? '0.0.0.0', () => {
      server.off('error', reject);
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      logger.info('Relay server listening', { port, responseDelayMs: config.responseDelayMs });
      resolve({ runtime, port, stop });
    });
  });
}
