import { HttpMessage, HttpParseError } from "./message.js";

const STATUS_LINE = /^(\w+)\/(1\.\d)\s+(\d{3})(?:\s+(.*))?$/;

/** HTTP/1.x response; same start-line bookkeeping as the request side. */
export class HttpResponseMessage extends HttpMessage {
  private _protocol = "";
  private _version = "";
  private _statusCode = 0;
  private _reasonPhrase = "";

  get protocol(): string {
    return this._protocol;
  }

  set protocol(value: string) {
    this._protocol = value;
    this.updateStatusLine();
  }

  get version(): string {
    return this._version;
  }

  set version(value: string) {
    this._version = value;
    this.updateStatusLine();
  }

  get statusCode(): number {
    return this._statusCode;
  }

  set statusCode(value: number) {
    this._statusCode = value;
    this.updateStatusLine();
  }

  get reasonPhrase(): string {
    return this._reasonPhrase;
  }

  set reasonPhrase(value: string) {
    this._reasonPhrase = value;
    this.updateStatusLine();
  }

  protected override parseStartLine(line: string): void {
    const match = STATUS_LINE.exec(line);
    if (!match) {
      throw new HttpParseError(
        "MALFORMED_START_LINE",
        `Invalid status line: '${line}'`,
      );
    }
    this.line = line;
    this._protocol = match[1];
    this._version = match[2];
    this._statusCode = Number.parseInt(match[3], 10);
    this._reasonPhrase = match[4] ?? "";
  }

  private updateStatusLine(): void {
    this.line = `${this._protocol}/${this._version} ${this._statusCode} ${this._reasonPhrase}`;
  }
}
