/**
 * Incremental JSON row decoder
 *
 * Query services answer with one JSON object whose rows attribute
 * (`results`, `rows` or `hits`) holds an array of records. This decoder is
 * fed the body chunk by chunk and hands out each array element as raw bytes
 * the moment its closing byte arrives, so the first row is visible long
 * before the body is complete. The other top-level attributes are parsed
 * into a metadata object.
 *
 * Malformed input poisons the decoder: the failing `push` (or `end`) throws a
 * {@link ProtocolError} and every later call rethrows it.
 *
 * @packageDocumentation
 */

import { ProtocolError } from '../errors/index.js';

// =============================================================================
// Constants
// =============================================================================

const OPEN_BRACE = 0x7b; // {
const CLOSE_BRACE = 0x7d; // }
const OPEN_BRACKET = 0x5b; // [
const CLOSE_BRACKET = 0x5d; // ]
const QUOTE = 0x22; // "
const BACKSLASH = 0x5c; // \
const COLON = 0x3a; // :
const COMMA = 0x2c; // ,

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

function isPrimitiveStart(byte: number): boolean {
  // - 0-9 t f n
  return byte === 0x2d || (byte >= 0x30 && byte <= 0x39) || byte === 0x74 || byte === 0x66 || byte === 0x6e;
}

enum ParserState {
  BEFORE_ROOT,
  OBJECT_OPEN,
  KEY,
  AFTER_KEY,
  BEFORE_VALUE,
  VALUE,
  ROWS_OPEN,
  ROW,
  ROWS_AFTER,
  AFTER_VALUE,
  AFTER_ROOT,
}

type ScanStep = 'continue' | 'complete-inclusive' | 'complete-exclusive';

interface ValueScan {
  kind: 'string' | 'container' | 'primitive';
  opened: boolean;
  depth: number;
  inString: boolean;
  escape: boolean;
  /** Offset in the current chunk where the unconsumed part of the value starts */
  start: number;
  parts: Buffer[];
}

// =============================================================================
// Decoder
// =============================================================================

export class JsonRowDecoder {
  readonly rowsAttribute: string;
  private state = ParserState.BEFORE_ROOT;
  private afterComma = false;
  private scan: ValueScan | null = null;
  private currentKey = '';
  private readonly rows: Buffer[] = [];
  private readonly meta: Record<string, unknown> = {};
  private failure: ProtocolError | null = null;
  private sawRows = false;
  private bytesSeen = 0;

  constructor(rowsAttribute: string) {
    this.rowsAttribute = rowsAttribute;
  }

  /** The rows array has been opened */
  get rowsStarted(): boolean {
    return this.sawRows;
  }

  /** The root object has been closed */
  get complete(): boolean {
    return this.state === ParserState.AFTER_ROOT;
  }

  get error(): ProtocolError | null {
    return this.failure;
  }

  /**
   * Feed the next chunk of the body.
   *
   * @throws ProtocolError on malformed input
   */
  push(chunk: Uint8Array): void {
    if (this.failure) {
      throw this.failure;
    }
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    if (this.scan) {
      this.scan.start = 0;
    }

    let i = 0;
    while (i < buffer.length) {
      i = this.step(buffer, i);
    }

    if (this.scan) {
      this.scan.parts.push(buffer.subarray(this.scan.start));
    }
    this.bytesSeen += buffer.length;
  }

  /**
   * Signal the end of the body.
   *
   * @throws ProtocolError if the body was truncated
   */
  end(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.state !== ParserState.AFTER_ROOT) {
      this.fail(
        this.bytesSeen === 0
          ? 'response body was empty'
          : `response body truncated after ${this.bytesSeen} bytes`
      );
    }
  }

  /** Rows decoded since the last call, in wire order */
  takeRows(): Buffer[] {
    return this.rows.splice(0, this.rows.length);
  }

  /** Top-level attributes other than the rows array, parsed so far */
  metadata(): Record<string, unknown> {
    return { ...this.meta };
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  /**
   * Process the byte at `i`. @returns the index of the next byte to process.
   */
  private step(chunk: Buffer, i: number): number {
    const byte = chunk[i];

    switch (this.state) {
      case ParserState.BEFORE_ROOT:
        if (isWhitespace(byte)) return i + 1;
        if (byte === OPEN_BRACE) {
          this.state = ParserState.OBJECT_OPEN;
          this.afterComma = false;
          return i + 1;
        }
        return this.fail(`expected '{' at start of body, found ${describe(byte)}`);

      case ParserState.OBJECT_OPEN:
        if (isWhitespace(byte)) return i + 1;
        if (byte === QUOTE) {
          this.beginScan('string', i);
          this.state = ParserState.KEY;
          return i;
        }
        if (byte === CLOSE_BRACE && !this.afterComma) {
          this.state = ParserState.AFTER_ROOT;
          return i + 1;
        }
        return this.fail(`expected attribute name, found ${describe(byte)}`);

      case ParserState.KEY:
      case ParserState.VALUE:
      case ParserState.ROW:
        return this.scanStep(chunk, i);

      case ParserState.AFTER_KEY:
        if (isWhitespace(byte)) return i + 1;
        if (byte === COLON) {
          this.state = ParserState.BEFORE_VALUE;
          return i + 1;
        }
        return this.fail(`expected ':' after "${this.currentKey}", found ${describe(byte)}`);

      case ParserState.BEFORE_VALUE:
        if (isWhitespace(byte)) return i + 1;
        if (byte === OPEN_BRACKET && this.currentKey === this.rowsAttribute) {
          this.sawRows = true;
          this.state = ParserState.ROWS_OPEN;
          this.afterComma = false;
          return i + 1;
        }
        this.beginValue(byte, i);
        this.state = ParserState.VALUE;
        return i;

      case ParserState.ROWS_OPEN:
        if (isWhitespace(byte)) return i + 1;
        if (byte === CLOSE_BRACKET && !this.afterComma) {
          this.state = ParserState.AFTER_VALUE;
          return i + 1;
        }
        this.beginValue(byte, i);
        this.state = ParserState.ROW;
        return i;

      case ParserState.ROWS_AFTER:
        if (isWhitespace(byte)) return i + 1;
        if (byte === COMMA) {
          this.state = ParserState.ROWS_OPEN;
          this.afterComma = true;
          return i + 1;
        }
        if (byte === CLOSE_BRACKET) {
          this.state = ParserState.AFTER_VALUE;
          return i + 1;
        }
        return this.fail(`expected ',' or ']' in ${this.rowsAttribute}, found ${describe(byte)}`);

      case ParserState.AFTER_VALUE:
        if (isWhitespace(byte)) return i + 1;
        if (byte === COMMA) {
          this.state = ParserState.OBJECT_OPEN;
          this.afterComma = true;
          return i + 1;
        }
        if (byte === CLOSE_BRACE) {
          this.state = ParserState.AFTER_ROOT;
          return i + 1;
        }
        return this.fail(`expected ',' or '}', found ${describe(byte)}`);

      case ParserState.AFTER_ROOT:
        if (isWhitespace(byte)) return i + 1;
        return this.fail(`unexpected ${describe(byte)} after end of body`);
    }
  }

  private beginValue(byte: number, i: number): void {
    if (byte === QUOTE) {
      this.beginScan('string', i);
    } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
      this.beginScan('container', i);
    } else if (isPrimitiveStart(byte)) {
      this.beginScan('primitive', i);
    } else {
      this.fail(`unexpected ${describe(byte)} at start of value`);
    }
  }

  private beginScan(kind: ValueScan['kind'], start: number): void {
    this.scan = { kind, opened: false, depth: 0, inString: false, escape: false, start, parts: [] };
  }

  private scanStep(chunk: Buffer, i: number): number {
    const scan = this.scan;
    if (!scan) {
      return this.fail('decoder lost track of the current value');
    }

    const result = advanceScan(scan, chunk[i]);
    if (result === 'continue') {
      return i + 1;
    }

    const end = result === 'complete-inclusive' ? i + 1 : i;
    scan.parts.push(chunk.subarray(scan.start, end));
    const raw = Buffer.concat(scan.parts);
    this.scan = null;
    this.completeValue(raw);
    return end;
  }

  private completeValue(raw: Buffer): void {
    switch (this.state) {
      case ParserState.KEY: {
        const key = this.parseJson(raw, 'attribute name');
        this.currentKey = typeof key === 'string' ? key : String(key);
        this.state = ParserState.AFTER_KEY;
        return;
      }
      case ParserState.ROW:
        this.parseJson(raw, `row in ${this.rowsAttribute}`);
        this.rows.push(raw);
        this.state = ParserState.ROWS_AFTER;
        return;
      case ParserState.VALUE:
        this.meta[this.currentKey] = this.parseJson(raw, `"${this.currentKey}"`);
        this.state = ParserState.AFTER_VALUE;
        return;
      default:
        this.fail('decoder completed a value outside of a value state');
    }
  }

  private parseJson(raw: Buffer, what: string): unknown {
    try {
      return JSON.parse(raw.toString('utf8'));
    } catch (error) {
      return this.fail(`malformed ${what}`, error);
    }
  }

  private fail(message: string, cause?: unknown): never {
    this.failure = new ProtocolError(message, { cause });
    this.scan = null;
    throw this.failure;
  }
}

function advanceScan(scan: ValueScan, byte: number): ScanStep {
  switch (scan.kind) {
    case 'string':
      if (!scan.opened) {
        scan.opened = true;
        return 'continue';
      }
      if (scan.escape) {
        scan.escape = false;
        return 'continue';
      }
      if (byte === BACKSLASH) {
        scan.escape = true;
        return 'continue';
      }
      return byte === QUOTE ? 'complete-inclusive' : 'continue';

    case 'container':
      if (scan.inString) {
        if (scan.escape) {
          scan.escape = false;
        } else if (byte === BACKSLASH) {
          scan.escape = true;
        } else if (byte === QUOTE) {
          scan.inString = false;
        }
        return 'continue';
      }
      if (byte === QUOTE) {
        scan.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        scan.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        scan.depth--;
        if (scan.depth === 0) {
          return 'complete-inclusive';
        }
      }
      return 'continue';

    case 'primitive':
      if (isWhitespace(byte) || byte === COMMA || byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        return 'complete-exclusive';
      }
      return 'continue';
  }
}

function describe(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? `'${String.fromCharCode(byte)}'` : `byte 0x${byte.toString(16)}`;
}
