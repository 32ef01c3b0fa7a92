import { describe, expect, it } from 'vitest';
import { LineFramer } from './lineFramer.js';
import { classifyLine } from './messages.js';

function frameAll(chunks: Uint8Array[]): string[] {
  const framer = new LineFramer();
  const lines: string[] = [];
  for (const chunk of chunks) {
    framer.push(chunk);
    lines.push(...framer.drain());
  }
  return lines;
}

const STREAM = Buffer.from(
  'ESP-ROM:esp32s3-20210327\r\n' +
  '{"status":"ready"}\n' +
  '\n' +
  '{"event":"touch","x":12,"y":40}\n' +
  '{"status":"ok","msg":"héllo ✓"}\n' +
  '{"event":"button"}\n' +
  '{"status":"err',
  'utf-8',
);

describe('LineFramer', () => {
  it('returns complete lines and keeps the partial tail', () => {
    const framer = new LineFramer();
    framer.push(Buffer.from('{"status":"ok"}\n{"event":'));
    expect(framer.drain()).toEqual(['{"status":"ok"}']);
    expect(framer.pendingBytes).toBe(9);

    framer.push(Buffer.from('"touch"}\n'));
    expect(framer.next()).toBe('{"event":"touch"}');
    expect(framer.next()).toBeNull();
  });

  it('drops blank lines and trims carriage returns', () => {
    expect(frameAll([Buffer.from('  \n\r\n{"status":"ok"}\r\n')])).toEqual(['{"status":"ok"}']);
  });

  it('substitutes invalid UTF-8 instead of throwing', () => {
    const lines = frameAll([Buffer.from([0x62, 0x6f, 0xff, 0x6f, 0x74, 0x0a])]);
    expect(lines).toEqual(['bo\uFFFDot']);
  });

  it('frames identically no matter where the chunk boundaries fall', () => {
    const whole = frameAll([STREAM]);
    const expected = whole.map(classifyLine);
    expect(whole).toHaveLength(5);

    for (let cut = 1; cut < STREAM.length; cut++) {
      const split = frameAll([STREAM.subarray(0, cut), STREAM.subarray(cut)]);
      expect(split.map(classifyLine)).toEqual(expected);
    }

    const byteByByte = frameAll([...STREAM].map(b => Uint8Array.of(b)));
    expect(byteByByte.map(classifyLine)).toEqual(expected);
  });

  it('forgets the carry-over on reset', () => {
    const framer = new LineFramer();
    framer.push(Buffer.from('boot noise without newline'));
    framer.reset();
    framer.push(Buffer.from('{"status":"ok"}\n'));
    expect(framer.drain()).toEqual(['{"status":"ok"}']);
  });
});
