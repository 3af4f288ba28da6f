import { describe, it, expect } from 'vitest';
import { MessageFramer } from './framing.js';

describe('MessageFramer', () => {
  it('returns a single-fragment message immediately', () => {
    const framer = new MessageFramer();
    expect(framer.push(Buffer.from('{"type":"log"}'), true)).toBe('{"type":"log"}');
    expect(framer.pendingLength).toBe(0);
  });

  it('accumulates fragments until end of message', () => {
    const framer = new MessageFramer();

    expect(framer.push(Buffer.from('{"type":'), false)).toBeNull();
    expect(framer.push('"task_completed",', false)).toBeNull();
    expect(framer.pendingLength).toBeGreaterThan(0);
    expect(framer.push(Buffer.from('"task_id":"t-1"}'), true)).toBe('{"type":"task_completed","task_id":"t-1"}');
  });

  it('keeps a multi-byte character split across fragments', () => {
    const framer = new MessageFramer();
    const bytes = Buffer.from('héllo', 'utf-8');
    // 'é' is two bytes at offsets 1-2; split between them
    expect(framer.push(bytes.subarray(0, 2), false)).toBeNull();
    expect(framer.push(bytes.subarray(2), true)).toBe('héllo');
  });

  it('accepts ArrayBuffer fragments', () => {
    const framer = new MessageFramer();
    const buffer = new ArrayBuffer(3);
    new Uint8Array(buffer).set([0x61, 0x62, 0x63]);
    expect(framer.push(buffer, true)).toBe('abc');
  });

  it('starts clean after reset', () => {
    const framer = new MessageFramer();
    framer.push('partial', false);
    framer.reset();
    expect(framer.push('next', true)).toBe('next');
  });
});
