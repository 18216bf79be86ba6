/**
 * Transport interface for line-oriented daemon communication.
 *
 * Implementations:
 * - SocketTransport: Uses Node.js net.Socket for direct TCP
 */
export interface Transport {
  /**
   * Initialize the transport (open connection, etc.)
   */
  init(): Promise<void>;

  /**
   * Send a command to the remote end
   */
  send(data: string): Promise<void>;

  /**
   * Wait for one complete line (without its terminator).
   * A timeout of 0 waits until a line arrives or the connection dies.
   */
  readLine(timeoutMs?: number): Promise<string>;

  /**
   * Close the transport
   */
  close(): Promise<void>;

  /**
   * Check if transport is open/active
   */
  isOpen(): boolean;
}

/**
 * Base class with common helper methods
 */
export abstract class BaseTransport implements Transport {
  protected buffer: string = '';
  protected _isOpen: boolean = false;

  constructor(protected readonly pollIntervalMs: number = 50) {}

  abstract init(): Promise<void>;
  abstract send(data: string): Promise<void>;
  abstract readRaw(): Promise<string>;
  abstract close(): Promise<void>;

  async readLine(timeoutMs: number = 0): Promise<string> {
    const start = Date.now();

    while (timeoutMs <= 0 || Date.now() - start < timeoutMs) {
      // Lines already buffered are delivered even after the peer hung up
      const line = this.takeLine();
      if (line !== null) {
        return line;
      }

      const newData = await this.readRaw();
      this.buffer += newData;

      if (newData.length === 0) {
        await this.delay(this.pollIntervalMs);
      }
    }

    throw new Error(`Timeout waiting for line after ${timeoutMs}ms`);
  }

  isOpen(): boolean {
    return this._isOpen;
  }

  protected takeLine(): string | null {
    const newline = this.buffer.indexOf('\n');
    if (newline === -1) {
      return null;
    }

    const line = this.buffer.slice(0, newline).replace(/\r$/, '');
    this.buffer = this.buffer.slice(newline + 1);
    return line;
  }

  protected delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
