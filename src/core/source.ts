/**
 * Something the counter can read text from, in full.
 *
 * `read()` throws `InputReadError` when the content cannot be obtained.
 */
export interface TextSource {
  /** Human-readable name for logs and error messages. */
  readonly name: string;
  read(): string;
}
