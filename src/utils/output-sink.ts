/**
 * Developer-facing output destination (an editor output channel, a terminal).
 * Writes are fire-and-forget: implementations must not block the caller.
 */
export interface OutputSink {
  appendLine(line: string): void;
}

/** Writes each line to a stream, stdout by default. */
export class StreamSink implements OutputSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  appendLine(line: string): void {
    this.stream.write(line + '\n');
  }
}

/** Keeps every line in memory. */
export class MemorySink implements OutputSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }

  clear(): void {
    this.lines.length = 0;
  }
}
