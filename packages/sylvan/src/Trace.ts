/**
 * Explicit, per-call trace of engine decisions. Passed through operation
 * options instead of living in shared state, so concurrent calls never
 * interleave their output.
 */
export class TraceContext {
  readonly _tag = "TraceContext" as const;
  private depth = 0;
  private readonly buffered: string[] = [];
  private readonly sink: ((line: string) => void) | undefined;

  constructor(sink?: (line: string) => void) {
    this.sink = sink;
  }

  log(message: string): void {
    const line = `${"  ".repeat(this.depth)}${message}`;
    if (this.sink !== undefined) {
      this.sink(line);
      return;
    }
    this.buffered.push(line);
  }

  /**
   * Runs `f` one indentation level deeper. The level is restored even when
   * `f` throws.
   */
  indent<A>(f: () => A): A {
    this.depth++;
    try {
      return f();
    } finally {
      this.depth--;
    }
  }

  /** Returns the buffered lines and clears the buffer. */
  flush(): string[] {
    return this.buffered.splice(0, this.buffered.length);
  }
}

export const make = (sink?: (line: string) => void): TraceContext => new TraceContext(sink);

/** Runs `f` indented when a trace is present. */
export const indented = <A>(trace: TraceContext | undefined, f: () => A): A =>
  trace === undefined ? f() : trace.indent(f);
