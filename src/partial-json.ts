type ExtractorState =
  | 'before_object'
  | 'structure'
  | 'key'
  | 'other_string'
  | 'capture'
  | 'done';

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Incremental extractor for one top-level string property of a JSON object
 * that arrives in arbitrary chunks (tool input deltas).
 *
 * `push()` returns only the newly decoded characters of the property value.
 * Escapes, including `\uXXXX` split across chunks and surrogate pairs, are
 * decoded before being emitted. Once the closing quote is seen `done` is true
 * and further input is ignored.
 */
export class PartialJsonStringExtractor {
  private readonly field: string;
  private state: ExtractorState = 'before_object';
  private depth = 0;
  private expectKey = false;
  private lastKey: string | undefined;
  private keyBuffer = '';
  private escaping = false;
  private unicodeDigits: string | undefined;
  private pendingHighSurrogate: string | undefined;
  private captured = '';

  constructor(field: string) {
    this.field = field;
  }

  get done(): boolean {
    return this.state === 'done';
  }

  get value(): string {
    return this.captured;
  }

  push(chunk: string): string {
    let out = '';
    // eslint-disable-next-line functional/no-loop-statements
    for (const char of chunk) {
      if (this.state === 'done') break;
      switch (this.state) {
        case 'before_object':
          if (char === '{') {
            this.state = 'structure';
            this.depth = 1;
            this.expectKey = true;
          }
          break;
        case 'structure':
          this.consumeStructure(char);
          break;
        case 'key': {
          const decoded = this.decodeStringChar(char);
          if (decoded === null) {
            this.lastKey = this.keyBuffer + (this.pendingHighSurrogate ?? '');
            this.pendingHighSurrogate = undefined;
            this.keyBuffer = '';
            this.state = 'structure';
          } else {
            this.keyBuffer += decoded;
          }
          break;
        }
        case 'other_string':
          if (this.decodeStringChar(char) === null) {
            this.pendingHighSurrogate = undefined;
            this.state = 'structure';
          }
          break;
        case 'capture': {
          const decoded = this.decodeStringChar(char);
          if (decoded === null) {
            if (this.pendingHighSurrogate !== undefined) {
              out += this.pendingHighSurrogate;
              this.pendingHighSurrogate = undefined;
            }
            this.state = 'done';
          } else {
            out += decoded;
          }
          break;
        }
      }
    }
    this.captured += out;
    return out;
  }

  private consumeStructure(char: string): void {
    if (char === '"') {
      if (this.depth === 1 && this.expectKey) {
        this.state = 'key';
        this.keyBuffer = '';
        return;
      }
      if (this.depth === 1 && this.lastKey === this.field) {
        this.state = 'capture';
        return;
      }
      this.state = 'other_string';
      return;
    }
    if (char === '{' || char === '[') {
      this.depth += 1;
      return;
    }
    if (char === '}' || char === ']') {
      this.depth -= 1;
      if (this.depth === 0) this.state = 'done';
      return;
    }
    if (this.depth !== 1) return;
    if (char === ',') {
      this.expectKey = true;
      this.lastKey = undefined;
    } else if (char === ':') {
      this.expectKey = false;
    }
  }

  /**
   * Decode one character inside a JSON string. Returns the decoded text
   * (possibly empty while an escape is incomplete) or null on the closing quote.
   */
  private decodeStringChar(char: string): string | null {
    if (this.unicodeDigits !== undefined) {
      this.unicodeDigits += char;
      if (this.unicodeDigits.length < 4) return '';
      const code = Number.parseInt(this.unicodeDigits, 16);
      this.unicodeDigits = undefined;
      if (Number.isNaN(code)) return '';
      return this.emitCodeUnit(code);
    }
    if (this.escaping) {
      this.escaping = false;
      if (char === 'u') {
        this.unicodeDigits = '';
        return '';
      }
      return this.flushSurrogate(SIMPLE_ESCAPES[char] ?? char);
    }
    if (char === '\\') {
      this.escaping = true;
      return '';
    }
    if (char === '"') return null;
    return this.flushSurrogate(char);
  }

  private emitCodeUnit(code: number): string {
    const unit = String.fromCharCode(code);
    if (code >= 0xd800 && code <= 0xdbff) {
      const previous = this.pendingHighSurrogate ?? '';
      this.pendingHighSurrogate = unit;
      return previous;
    }
    if (code >= 0xdc00 && code <= 0xdfff && this.pendingHighSurrogate !== undefined) {
      const pair = this.pendingHighSurrogate + unit;
      this.pendingHighSurrogate = undefined;
      return pair;
    }
    return this.flushSurrogate(unit);
  }

  private flushSurrogate(text: string): string {
    if (this.pendingHighSurrogate === undefined) return text;
    const pending = this.pendingHighSurrogate;
    this.pendingHighSurrogate = undefined;
    return pending + text;
  }
}
