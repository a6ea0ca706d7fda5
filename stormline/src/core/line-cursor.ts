/**
 * Single-owner cursor over a line sequence.
 * The best-track format is stateful (a header's entry count decides how many of the
 * following lines belong to it), so the scan position lives here and nowhere else.
 */
export interface Line {
  text: string;
  /** 1-based position in the source. */
  number: number;
}

export class LineCursor {
  private readonly iterator: Iterator<string>;
  private buffered: Line | null = null;
  private consumed = 0;
  private exhausted = false;

  constructor(lines: Iterable<string>) {
    this.iterator = lines[Symbol.iterator]();
  }

  /**
   * Split raw file contents on LF or CRLF. A leading byte-order mark is dropped,
   * and a trailing newline does not produce an extra empty line.
   */
  static fromText(text: string): LineCursor {
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return new LineCursor(lines);
  }

  /** Look at the next line without consuming it. */
  peek(): Line | null {
    if (this.buffered) return this.buffered;
    if (this.exhausted) return null;

    const result = this.iterator.next();
    if (result.done) {
      this.exhausted = true;
      return null;
    }
    this.buffered = { text: result.value, number: this.consumed + 1 };
    return this.buffered;
  }

  /** Consume and return the next line, or null at end of input. */
  next(): Line | null {
    const line = this.peek();
    if (line) {
      this.buffered = null;
      this.consumed = line.number;
    }
    return line;
  }

  /** Number of the last consumed line (0 before the first). */
  get position(): number {
    return this.consumed;
  }

  get done(): boolean {
    return this.peek() === null;
  }
}
