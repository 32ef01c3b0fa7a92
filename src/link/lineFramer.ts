const NEWLINE = 0x0a;

/**
 * Splits a byte stream into `\n`-terminated text lines.
 *
 * Bytes after the last newline stay in a carry-over buffer until the rest
 * of the line arrives. Lines are only decoded once complete, so a UTF-8
 * sequence split across reads decodes the same as an unsplit one. Invalid
 * UTF-8 becomes U+FFFD instead of throwing; boot logs share the stream.
 */
export class LineFramer {
  private carry: Buffer = Buffer.alloc(0);

  push(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    this.carry = this.carry.length === 0
      ? Buffer.from(bytes)
      : Buffer.concat([this.carry, bytes]);
  }

  /** Next complete non-empty line, or null when only a partial line remains. */
  next(): string | null {
    while (true) {
      const idx = this.carry.indexOf(NEWLINE);
      if (idx < 0) return null;
      const text = this.carry.subarray(0, idx).toString('utf-8').trim();
      this.carry = this.carry.subarray(idx + 1);
      if (text.length > 0) return text;
    }
  }

  drain(): string[] {
    const lines: string[] = [];
    for (let line = this.next(); line !== null; line = this.next()) {
      lines.push(line);
    }
    return lines;
  }

  reset(): void {
    this.carry = Buffer.alloc(0);
  }

  get pendingBytes(): number {
    return this.carry.length;
  }
}
