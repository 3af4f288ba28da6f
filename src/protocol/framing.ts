/**
 * Message reassembly for the event stream.
 * A logical message may arrive as several transport fragments; text is
 * accumulated until the transport marks the end of the message.
 */

import { TextDecoder } from 'node:util';

export type Chunk = Buffer | ArrayBuffer | Uint8Array | string;

export class MessageFramer {
  private buffer = '';
  private decoder = new TextDecoder('utf-8');

  /**
   * Push a fragment. Returns the complete message text when `endOfMessage`
   * is set, otherwise null.
   */
  push(chunk: Chunk, endOfMessage: boolean): string | null {
    if (typeof chunk === 'string') {
      this.buffer += this.decoder.decode() + chunk;
    } else {
      const bytes = chunk instanceof ArrayBuffer ? new Uint8Array(chunk) : chunk;
      // stream: true keeps a code point split across fragments intact
      this.buffer += this.decoder.decode(bytes, { stream: !endOfMessage });
    }

    if (!endOfMessage) {
      return null;
    }

    const message = this.buffer + this.decoder.decode();
    this.buffer = '';
    return message;
  }

  /** Characters buffered while waiting for an end-of-message marker. */
  get pendingLength(): number {
    return this.buffer.length;
  }

  /**
   * Reset parser state (e.g., on connection reset).
   */
  reset(): void {
    this.buffer = '';
    this.decoder = new TextDecoder('utf-8');
  }
}
