import type { ReportLevel, ReportingSink } from '../../src/index.js';

export interface RecordedReport {
  level: ReportLevel;
  message: string;
}

/**
 * In-memory reporting sink for assertions
 */
export class RecordingSink implements ReportingSink {
  readonly reports: RecordedReport[] = [];

  log(message: string): void {
    this.reports.push({ level: 'log', message });
  }

  debug(message: string): void {
    this.reports.push({ level: 'debug', message });
  }

  warn(message: string): void {
    this.reports.push({ level: 'warn', message });
  }

  get warnings(): string[] {
    return this.reports.filter((report) => report.level === 'warn').map((report) => report.message);
  }
}
