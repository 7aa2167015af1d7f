/**
 * Splits a text stream into lines.
 *
 * Chunks may end anywhere, including mid-line or mid-character of a
 * multi-byte sequence already decoded upstream. Complete lines come back
 * trimmed, with blank lines dropped; the trailing partial line is held
 * until the next chunk or `flush()`.
 */
export class LineFramer {
  private lineBuffer = '';

  push(chunk: string): string[] {
    this.lineBuffer += chunk;
    const parts = this.lineBuffer.split('\n');
    this.lineBuffer = parts.pop() ?? '';

    const lines: string[] = [];
    for (const part of parts) {
      const line = part.trim();
      if (line) lines.push(line);
    }
    return lines;
  }

  /**
   * Return the held partial line at end of stream
   */
  flush(): string | undefined {
    const line = this.lineBuffer.trim();
    this.lineBuffer = '';
    return line || undefined;
  }

  get pending(): string {
    return this.lineBuffer;
  }
}
