import { afterEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@trialkey/utils';
import { DeferredReportingSink, ReportingHandler } from '../../src/index.js';
import { RecordingSink } from '../helpers/recording-sink.js';

describe('DeferredReportingSink', () => {
  it('should buffer reports until a target is attached', () => {
    const deferred = new DeferredReportingSink();
    deferred.warn('first');
    deferred.log('second');

    expect(deferred.isAttached).toBe(false);
    expect(deferred.pending).toBe(2);
  });

  it('should replay buffered reports in order on attach', () => {
    const deferred = new DeferredReportingSink();
    const target = new RecordingSink();
    deferred.warn('first');
    deferred.debug('second');

    deferred.attach(target);
    deferred.log('third');

    expect(deferred.pending).toBe(0);
    expect(target.reports).toEqual([
      { level: 'warn', message: 'first' },
      { level: 'debug', message: 'second' },
      { level: 'log', message: 'third' },
    ]);
  });

  it('should route to the latest target only', () => {
    const first = new RecordingSink();
    const second = new RecordingSink();
    const deferred = new DeferredReportingSink(first);

    deferred.log('before');
    deferred.attach(second);
    deferred.log('after');

    expect(first.reports).toEqual([{ level: 'log', message: 'before' }]);
    expect(second.reports).toEqual([{ level: 'log', message: 'after' }]);
  });
});

describe('ReportingHandler', () => {
  let handler: ReportingHandler | undefined;

  afterEach(() => {
    handler?.close();
    handler = undefined;
  });

  it('should map sink levels onto the logger', () => {
    handler = new ReportingHandler();
    const info = vi.spyOn(handler.logger, 'info');
    const warn = vi.spyOn(handler.logger, 'warn');
    const debug = vi.spyOn(handler.logger, 'debug');

    handler.log('logged');
    handler.warn('warned');
    handler.debug('debugged');

    expect(info).toHaveBeenCalledWith('logged');
    expect(warn).toHaveBeenCalledWith('warned');
    expect(debug).toHaveBeenCalledWith('debugged');
  });

  it('should format floats with the configured digits', () => {
    handler = new ReportingHandler({ floatDigits: 3 });
    expect(handler.formatFloat(1 / 3)).toBe('0.333');
    expect(new ReportingHandler().formatFloat(0.5)).toBe('0.50000');
  });

  it('should have no heartbeat without a path', () => {
    handler = new ReportingHandler({ heartbeatPath: null });
    expect(handler.heartbeatPath).toBeNull();
  });

  it('should reject invalid parameters', () => {
    expect(() => new ReportingHandler({ floatDigits: -1 })).toThrow(ValidationError);
  });
});
