/**
 * Destination for the text a command produces
 */
export interface ReportSink {
  line(text: string): void;
}

/**
 * Writes report lines to stdout
 */
export class ConsoleReportSink implements ReportSink {
  line(text: string): void {
    console.log(text);
  }
}

/**
 * Collects report lines in memory, for the MCP tool and tests
 */
export class BufferReportSink implements ReportSink {
  readonly lines: string[] = [];

  line(text: string): void {
    this.lines.push(text);
  }

  text(): string {
    return this.lines.join('\n');
  }
}
