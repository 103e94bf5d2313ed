/**
 * Receives human-readable progress lines. The core never interprets them.
 */
export interface OutputSink {
  writeln(line: string): void;
}

export function consoleOutput(): OutputSink {
  return {
    writeln: (line) => {
      process.stdout.write(`${line}\n`);
    },
  };
}

/** Collects lines in memory; used by the CLI summary and tests. */
export class BufferedOutput implements OutputSink {
  readonly lines: string[] = [];

  writeln(line: string): void {
    this.lines.push(line);
  }
}
