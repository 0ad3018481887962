import { HttpMessage, HttpParseError } from "./message.js";

const REQUEST_LINE = /^(\w+)\s+(\S+)\s+(\w+)\/(1\.\d)$/;

/**
 * HTTP/1.x request. The request-line parts are writable; assigning any of
 * them rebuilds the start line so both views stay in step.
 */
export class HttpRequestMessage extends HttpMessage {
  private _method = "";
  private _uri = "";
  private _protocol = "";
  private _version = "";

  get method(): string {
    return this._method;
  }

  set method(value: string) {
    this._method = value;
    this.updateRequestLine();
  }

  get uri(): string {
    return this._uri;
  }

  set uri(value: string) {
    this._uri = value;
    this.updateRequestLine();
  }

  get protocol(): string {
    return this._protocol;
  }

  set protocol(value: string) {
    this._protocol = value;
    this.updateRequestLine();
  }

  get version(): string {
    return this._version;
  }

  set version(value: string) {
    this._version = value;
    this.updateRequestLine();
  }

  protected override parseStartLine(line: string): void {
    const match = REQUEST_LINE.exec(line);
    if (!match) {
      throw new HttpParseError(
        "MALFORMED_START_LINE",
        `Invalid request line: '${line}'`,
      );
    }
    this.line = line;
    [, this._method, this._uri, this._protocol, this._version] = match;
  }

  private updateRequestLine(): void {
    this.line = `${this._method} ${this._uri} ${this._protocol}/${this._version}`;
  }
}
