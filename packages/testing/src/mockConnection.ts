/**
 * @fileoverview Mock relay connection for testing RelayRuntime.
 */

/**
 * Mock connection interface that tracks sent data.
 */
export interface MockConnection {
  readonly id: string;

  /** Send data (stored in sentData while open) */
  send(data: string): void;

  /** Close the connection */
  close(): void;

  readonly isOpen: boolean;

  /** Everything that has been sent through this connection */
  readonly sentData: string[];

  /** Parse all sent data as JSON, one object per send */
  getSentMessagesAsJson<T = unknown>(): T[];

  /** Clear the sent data array */
  clearSentData(): void;
}

let nextId = 1;

/**
 * Create a mock connection for testing.
 *
 * The mock connection:
 * - Starts open
 * - Stores all sent data in `sentData`
 * - Drops sends after `close()`
 *
 * @example
 * ```typescript
 * const conn = createMockConnection();
 * runtime.handleConnection(conn);
 * await runtime.handleData(conn, Buffer.from(shotJson));
 *
 * expect(conn.getSentMessagesAsJson()).toEqual([{ Code: 201, ... }]);
 * ```
 */
export function createMockConnection(id = `mock-${nextId++}`): MockConnection {
  const sentData: string[] = [];
  let isOpen = true;

  return {
    id,

    send(data: string): void {
      if (isOpen) {
        sentData.push(data);
      }
    },

    close(): void {
      isOpen = false;
    },

    get isOpen(): boolean {
      return isOpen;
    },

    get sentData(): string[] {
      return sentData;
    },

    getSentMessagesAsJson<T = unknown>(): T[] {
      return sentData.map((data) => JSON.parse(data) as T);
    },

    clearSentData(): void {
      sentData.length = 0;
    },
  };
}
