import type { DumpValue, TomlEncoder } from "./encoder.js";

/**
 * A value paired with comment text taken from a source document. The comment
 * is written back verbatim, `#` included.
 */
export class CommentedValue<T = unknown> {
  constructor(
    readonly value: T,
    readonly comment: string,
    /** Write the comment on the line after the value. */
    readonly ownLine = false,
  ) {}

  dump(dumpValue: DumpValue): string {
    const text = dumpValue(this.value);
    return this.ownLine ? `${text}\n${this.comment}` : `${text} ${this.comment}`;
  }

  toString(): string {
    return String(this.value);
  }
}

/** Encoder extension: render `CommentedValue`s with their comments. */
export function preserveComments(encoder: TomlEncoder): void {
  encoder.registerType(CommentedValue, (value, dumpValue) => value.dump(dumpValue));
}
