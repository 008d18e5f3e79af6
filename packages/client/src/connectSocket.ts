import { connect, type Socket } from 'node:net';
import { TransportError } from '@shot-relay/protocol';

/**
 * Open a TCP connection, failing after `timeoutMs` if the handshake has not
 * completed.
 * @throws {TransportError} on refusal, reset or timeout
 */
export function connectSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });

    const timer = setTimeout(() => {
      socket.off('error', onError);
      socket.destroy();
      reject(new TransportError(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new TransportError(error.message, { cause: error }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}
