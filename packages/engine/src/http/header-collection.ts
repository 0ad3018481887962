import { CRLF } from "../utils/buffer.js";

export class HeaderField {
  constructor(
    readonly name: string,
    public value: string,
  ) {}

  serialize(): string {
    return `${this.name}: ${this.value}${CRLF}`;
  }
}

/**
 * Ordered header store. Duplicate names are kept (Set-Cookie and friends),
 * and names are matched exactly as written on the wire.
 */
export class HeaderCollection implements Iterable<HeaderField> {
  private fields: HeaderField[] = [];

  get size(): number {
    return this.fields.length;
  }

  add(name: string, value: string): void {
    this.fields.push(new HeaderField(name, value));
  }

  /** Value of the first field named `name`. Duplicates are not joined. */
  value(name: string): string | undefined {
    return this.fields.find((field) => field.name === name)?.value;
  }

  values(name: string): string[] {
    return this.fields
      .filter((field) => field.name === name)
      .map((field) => field.value);
  }

  has(name: string): boolean {
    return this.fields.some((field) => field.name === name);
  }

  remove(name: string): void {
    this.fields = this.fields.filter((field) => field.name !== name);
  }

  /** Leaves exactly one field named `name`, appended at the end. */
  replace(name: string, value: string): void {
    this.remove(name);
    this.add(name, value);
  }

  serialize(): string {
    return this.fields.map((field) => field.serialize()).join("");
  }

  *entries(): IterableIterator<HeaderField> {
    for (const field of this.fields) {
      yield field;
    }
  }

  [Symbol.iterator](): Iterator<HeaderField> {
    return this.entries();
  }
}
