import {
  CRLF,
  CRLF_CRLF,
  concat,
  findSequence,
  latin1ToString,
  stringToLatin1,
} from "../utils/buffer.js";
import { HeaderCollection } from "./header-collection.js";

export const DEFAULT_MAX_HEADER_SIZE = 64 * 1024; // 64KB

const HEADER_LINE = /^([a-z0-9-]+):\s*(.*)$/i;
const CONTINUATION_LINE = /^[ \t]+(.*)$/;

export type HttpParseErrorCode =
  | "MALFORMED_START_LINE"
  | "MALFORMED_HEADER_LINE"
  | "ORPHAN_CONTINUATION"
  | "HEADERS_TOO_LARGE"
  | "NOT_READY";

export class HttpParseError extends Error {
  constructor(
    readonly code: HttpParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpParseError";
  }
}

export interface HttpMessageOptions {
  /** Largest header block accepted before the terminator. Default: 64KB */
  maxHeaderSize?: number;
}

/**
 * Incremental HTTP/1.x message parser.
 *
 * Chunks are fed in as they arrive. The first time the accumulated bytes
 * contain CRLF CRLF, the start line and header block are parsed and
 * `headersRead` flips to true for good. Whatever followed the terminator
 * stays in the buffer as body bytes, and any later chunk is appended there
 * without being looked at.
 */
export class HttpMessage {
  readonly headers = new HeaderCollection();

  protected line = "";
  private buffer: Uint8Array = new Uint8Array(0);
  private complete = false;
  private readonly maxHeaderSize: number;

  constructor(options?: HttpMessageOptions) {
    this.maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
  }

  get headersRead(): boolean {
    return this.complete;
  }

  get startLine(): string {
    return this.line;
  }

  /** Body bytes received so far. Empty until the headers are read. */
  get body(): Uint8Array {
    return this.complete ? this.buffer : new Uint8Array(0);
  }

  feed(chunk: Uint8Array): void {
    const searchFrom = Math.max(0, this.buffer.length - (CRLF_CRLF.length - 1));
    this.buffer = concat([this.buffer, chunk]);

    if (this.complete) return;

    const separatorIndex = findSequence(this.buffer, CRLF_CRLF, searchFrom);
    if (separatorIndex === -1) {
      // A partial terminator may already be buffered
      if (this.buffer.length - (CRLF_CRLF.length - 1) > this.maxHeaderSize) {
        throw new HttpParseError(
          "HEADERS_TOO_LARGE",
          `Header block exceeds ${this.maxHeaderSize} bytes`,
        );
      }
      return;
    }

    if (separatorIndex > this.maxHeaderSize) {
      throw new HttpParseError(
        "HEADERS_TOO_LARGE",
        `Header block exceeds ${this.maxHeaderSize} bytes`,
      );
    }

    this.parseHead(latin1ToString(this.buffer.subarray(0, separatorIndex)));
    // slice() copies, so the header bytes are released with the old buffer
    this.buffer = this.buffer.slice(separatorIndex + CRLF_CRLF.length);
    this.complete = true;
  }

  /** Hands the buffered body bytes over to the caller. */
  takeBody(): Uint8Array {
    if (!this.complete) {
      throw new HttpParseError("NOT_READY", "Headers have not been read yet");
    }
    const body = this.buffer;
    this.buffer = new Uint8Array(0);
    return body;
  }

  /** Start line, headers, blank line and the body bytes buffered so far. */
  serialize(): Uint8Array {
    if (!this.complete) {
      throw new HttpParseError("NOT_READY", "Headers have not been read yet");
    }
    const head = this.line + CRLF + this.headers.serialize() + CRLF;
    return concat([stringToLatin1(head), this.buffer]);
  }

  /** Called once with the start line as received. */
  protected parseStartLine(line: string): void {
    this.line = line;
  }

  private parseHead(head: string): void {
    const lines = head.split(CRLF);
    const startLine = lines.shift() ?? "";

    const fields: Array<[string, string]> = [];
    let name: string | null = null;
    let value = "";
    for (const line of lines) {
      const header = HEADER_LINE.exec(line);
      if (header) {
        if (name !== null) fields.push([name, value]);
        name = header[1];
        value = header[2].trim();
        continue;
      }

      const continuation = CONTINUATION_LINE.exec(line);
      if (continuation) {
        if (name === null) {
          throw new HttpParseError(
            "ORPHAN_CONTINUATION",
            `Invalid header, unexpected continuation: '${line}'`,
          );
        }
        value += continuation[1].trim();
        continue;
      }

      throw new HttpParseError(
        "MALFORMED_HEADER_LINE",
        `Invalid header line: '${line}'`,
      );
    }
    if (name !== null) fields.push([name, value]);

    this.parseStartLine(startLine);
    for (const [fieldName, fieldValue] of fields) {
      this.headers.add(fieldName, fieldValue);
    }
  }
}
