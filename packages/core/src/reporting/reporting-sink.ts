/**
 * Reporting sink
 *
 * The user-facing channel for environment messages. Anything reported before
 * a real sink is attached is buffered and replayed in order on attach.
 */

export interface ReportingSink {
  log(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
}

export type ReportLevel = keyof ReportingSink;

interface BufferedReport {
  readonly level: ReportLevel;
  readonly message: string;
}

export class DeferredReportingSink implements ReportingSink {
  private target: ReportingSink | null;
  private readonly buffer: BufferedReport[] = [];

  constructor(target: ReportingSink | null = null) {
    this.target = target;
  }

  get isAttached(): boolean {
    return this.target !== null;
  }

  /**
   * Number of reports waiting for a target
   */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Route reports to `target` from now on, replaying the buffer first.
   * Attaching again replaces the previous target.
   */
  attach(target: ReportingSink): void {
    this.target = target;
    const buffered = this.buffer.splice(0, this.buffer.length);
    for (const report of buffered) {
      target[report.level](report.message);
    }
  }

  log(message: string): void {
    this.emit('log', message);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  private emit(level: ReportLevel, message: string): void {
    if (this.target) {
      this.target[level](message);
      return;
    }
    this.buffer.push({ level, message });
  }
}
