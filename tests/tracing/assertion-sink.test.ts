/**
 * Tests for the AssertionSink trace adapter
 */

import { AssertionLayer } from '../../src/layer';
import { AssertionSink, extractMessage } from '../../src/tracing/assertion-sink';
import { TraceEvent } from '../../src/tracing/types';

function makeEvent(data: Record<string, unknown>, type: string = 'log'): TraceEvent {
  return { v: 1, type, ts: '2026-01-01T00:00:00.000Z', run_id: 'test-run', data };
}

describe('tracing/AssertionSink', () => {
  let layer: AssertionLayer;
  let sink: AssertionSink;

  beforeEach(() => {
    layer = new AssertionLayer();
    sink = layer.sink();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('delivers the message of each event to the layer', () => {
    const started = layer.matches('worker started');

    sink.emit(makeEvent({ message: 'booting' }));
    expect(started.evaluate()).toBe(false);

    sink.emit(makeEvent({ message: 'worker started', pid: 42 }));
    expect(started.evaluate()).toBe(true);
    expect(sink.stats()).toEqual({ delivered: 2, skipped: 0 });
  });

  it('skips events without a string message', () => {
    const deliver = jest.spyOn(layer, 'deliver');

    sink.emit(makeEvent({ step: 3 }, 'step_start'));
    sink.emit(makeEvent({ message: 12 }));

    expect(deliver).not.toHaveBeenCalled();
    expect(sink.stats()).toEqual({ delivered: 0, skipped: 2 });
  });

  it('drops malformed events with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const seen = layer.matches('hello');

    sink.emit(makeEvent({ message: 'hello' }, ''));

    expect(seen.evaluate()).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      '[assertions] dropping malformed trace event: type: String must contain at least 1 character(s)'
    );
    expect(sink.stats()).toEqual({ delivered: 0, skipped: 1 });
  });

  it('uses a custom extractor', () => {
    const custom = layer.sink({ extract: event => `${event.type}:${String(event.data.code)}` });
    const failed = layer.matchesPattern(/^http_response:5\d\d$/);

    custom.emit(makeEvent({ code: 200 }, 'http_response'));
    expect(failed.evaluate()).toBe(false);

    custom.emit(makeEvent({ code: 503 }, 'http_response'));
    expect(failed.evaluate()).toBe(true);
  });

  it('ignores events after close', async () => {
    const late = layer.matches('late');

    await sink.close();
    await sink.close();
    sink.emit(makeEvent({ message: 'late' }));

    expect(sink.isClosed()).toBe(true);
    expect(late.evaluate()).toBe(false);
    expect(sink.stats()).toEqual({ delivered: 0, skipped: 0 });
  });

  it('identifies itself', () => {
    expect(sink.getSinkType()).toBe('AssertionSink');
  });

  describe('extractMessage', () => {
    it('returns data.message only when it is a string', () => {
      expect(extractMessage(makeEvent({ message: 'hi' }))).toBe('hi');
      expect(extractMessage(makeEvent({ message: null }))).toBeNull();
      expect(extractMessage(makeEvent({}))).toBeNull();
    });
  });
});
