// Codec error type shared by the text codecs

/**
 * Thrown by the text codecs when content is structurally invalid.
 * Carries the 1-based line where the problem starts.
 */
export class CodecError extends Error {
  readonly line: number;
  readonly reason: string;

  constructor(reason: string, line: number) {
    super(`${reason} (line ${line})`);
    this.name = 'CodecError';
    this.line = line;
    this.reason = reason;
  }
}
