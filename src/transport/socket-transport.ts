/**
 * Transport implementation using Node.js net.Socket for a direct TCP
 * connection to gpsd.
 *
 * Incoming data is accumulated by the 'data' handler and drained by
 * readRaw(); BaseTransport splits it into lines.
 */

import * as net from 'node:net';
import { BaseTransport } from './transport.js';
import { config } from '../config.js';
import { TransportTraceLogger } from './trace-logger.js';

export class SocketTransport extends BaseTransport {
  private host: string;
  private port: number;
  private socket: net.Socket | null = null;
  private outputBuffer: string = '';
  private connectTimeout: number;
  private trace: TransportTraceLogger;

  constructor(
    host: string = config.gpsd.host,
    port: number = config.gpsd.port,
    options: { connectTimeout?: number; pollIntervalMs?: number } = {}
  ) {
    super(options.pollIntervalMs ?? config.poll.intervalMs);
    this.host = host;
    this.port = port;
    this.connectTimeout = options.connectTimeout ?? config.timeouts.connect;
    this.trace = new TransportTraceLogger(`socket-${host}-${port}`);
  }

  async init(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;

      const timeout = setTimeout(() => {
        socket.destroy();
        this.socket = null;
        reject(new Error(`Connection timeout after ${this.connectTimeout}ms`));
      }, this.connectTimeout);

      this.trace.logInfo(`connecting to ${this.host}:${this.port}`);

      socket.on('connect', () => {
        clearTimeout(timeout);
        this._isOpen = true;
        resolve();
      });

      // Decoded by the socket so a character split across chunks stays whole
      socket.setEncoding('utf8');
      socket.on('data', (data: string) => {
        this.outputBuffer += data;
        this.trace.logReceive(data);
      });

      socket.on('error', (err: Error) => {
        clearTimeout(timeout);
        this._isOpen = false;
        this.trace.logError(err);
        // No-op once connected; readRaw() reports the dead connection
        reject(new Error(`Socket error: ${err.message}`, { cause: err }));
      });

      socket.on('close', () => {
        this._isOpen = false;
        this.trace.logInfo('socket closed');
      });

      socket.on('end', () => {
        this._isOpen = false;
        this.trace.logInfo('socket ended');
      });

      socket.connect(this.port, this.host);
    });
  }

  async send(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket || !this._isOpen) {
      throw new Error('Transport not initialized');
    }

    return new Promise((resolve, reject) => {
      this.trace.logSend(data);
      socket.write(data, 'utf-8', (err) => {
        if (err) {
          reject(new Error(`Send error: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async readRaw(): Promise<string> {
    const output = this.outputBuffer;
    this.outputBuffer = '';

    // Hand out whatever arrived before the peer hung up, then fail
    if (output.length === 0 && !this._isOpen) {
      throw new Error('Connection to gpsd closed');
    }
    return output;
  }

  async close(): Promise<void> {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this._isOpen = false;
    this.outputBuffer = '';
    this.buffer = '';
    this.trace.logInfo('transport closed');
    this.trace.close();
  }
}
