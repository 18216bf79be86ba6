/**
 * In-process stand-in for a gpsd connection.
 *
 * Each readRaw() hands out one scripted chunk. Once the chunks run out the
 * transport either reports the peer as gone (endOfStream) or stays silent.
 */

import { BaseTransport } from '../../../src/transport/transport.js';

export interface ScriptedTransportOptions {
  endOfStream?: boolean;
  initError?: Error;
}

export class ScriptedTransport extends BaseTransport {
  readonly sent: string[] = [];
  initCalls = 0;
  closeCalls = 0;
  private readonly chunks: string[];

  constructor(chunks: string[], private readonly scriptOptions: ScriptedTransportOptions = {}) {
    super(1);
    this.chunks = [...chunks];
  }

  async init(): Promise<void> {
    this.initCalls++;
    if (this.scriptOptions.initError) {
      throw this.scriptOptions.initError;
    }
    this._isOpen = true;
  }

  async send(data: string): Promise<void> {
    if (!this._isOpen) {
      throw new Error('Transport not initialized');
    }
    this.sent.push(data);
  }

  async readRaw(): Promise<string> {
    const chunk = this.chunks.shift();
    if (chunk !== undefined) {
      return chunk;
    }
    if (this.scriptOptions.endOfStream) {
      this._isOpen = false;
      throw new Error('Connection to gpsd closed');
    }
    return '';
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this._isOpen = false;
  }
}

/**
 * One JSON report per line, as gpsd sends them.
 */
export function reportLines(...reports: object[]): string[] {
  return reports.map(report => `${JSON.stringify(report)}\r\n`);
}
