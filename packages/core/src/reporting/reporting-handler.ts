/**
 * Reporting Handler
 *
 * Winston-backed reporting sink: console output gated by `verbose`, plus an
 * optional heartbeat file that records everything down to `debug`.
 */

import winston from 'winston';
import { z } from 'zod';
import { ValidationError, consoleFormat, getLoggingConfig } from '@trialkey/utils';
import type { ReportingSink } from './reporting-sink.js';

const ReportLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const TransportParamsSchema = z.object({ level: ReportLevelSchema.optional() }).nullable().optional();

export const ReportingHandlerParamsSchema = z.object({
  heartbeatPath: z.string().nullable().optional(),
  floatDigits: z.number().int().min(0).max(20).optional(),
  consoleParams: TransportParamsSchema,
  heartbeatParams: TransportParamsSchema,
});

export type ReportingHandlerParams = z.infer<typeof ReportingHandlerParamsSchema>;

export interface ReportingHandlerOptions {
  verbose?: boolean;
}

const heartbeatFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(
    ({ timestamp, level, message }) => `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`
  )
);

export class ReportingHandler implements ReportingSink {
  readonly logger: winston.Logger;
  readonly heartbeatPath: string | null;
  readonly floatDigits: number;

  constructor(params: ReportingHandlerParams = {}, options: ReportingHandlerOptions = {}) {
    const parsed = ReportingHandlerParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError('Invalid reportingHandlerParams', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const { heartbeatPath, floatDigits, consoleParams, heartbeatParams } = parsed.data;
    this.heartbeatPath = heartbeatPath ?? null;
    this.floatDigits = floatDigits ?? 5;

    const transports: winston.transport[] = [];
    if (getLoggingConfig().enableConsole) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          level: consoleParams?.level ?? (options.verbose === false ? 'warn' : 'info'),
        })
      );
    }
    if (this.heartbeatPath !== null) {
      transports.push(
        new winston.transports.File({
          filename: this.heartbeatPath,
          format: heartbeatFormat,
          level: heartbeatParams?.level ?? 'debug',
        })
      );
    }

    this.logger = winston.createLogger({
      level: 'debug',
      transports,
      silent: transports.length === 0,
      exitOnError: false,
    });
  }

  log(message: string): void {
    this.logger.info(message);
  }

  debug(message: string): void {
    this.logger.debug(message);
  }

  warn(message: string): void {
    this.logger.warn(message);
  }

  formatFloat(value: number): string {
    return value.toFixed(this.floatDigits);
  }

  close(): void {
    this.logger.close();
  }
}
