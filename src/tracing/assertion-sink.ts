/**
 * AssertionSink: feeds trace events into an AssertionLayer.
 *
 * Each event is validated against `TraceEventSchema`, reduced to a payload
 * string by the configured extractor and delivered to the layer. Events the
 * extractor returns null for are skipped.
 *
 * @example
 * ```typescript
 * const layer = new AssertionLayer();
 * const sink = layer.sink();
 * pipeline.subscribe(event => sink.emit(event));
 *
 * const done = layer.matches('checkout complete');
 * // ... run the code under test ...
 * done.assert();
 * ```
 */

import type { AssertionLayer } from '../layer';
import { formatIssues } from '../config';
import { TraceSink } from './sink';
import { TraceEvent, TraceEventSchema } from './types';

export type PayloadExtractor = (event: TraceEvent) => string | null;

export interface AssertionSinkOptions {
  /** Turns an event into the payload offered to the layer (default: `extractMessage`) */
  extract?: PayloadExtractor;
}

/**
 * Default extractor: the event's `data.message` when it is a string.
 */
export function extractMessage(event: TraceEvent): string | null {
  const message = event.data.message;
  return typeof message === 'string' ? message : null;
}

export class AssertionSink extends TraceSink {
  private readonly extract: PayloadExtractor;
  private delivered: number = 0;
  private skipped: number = 0;

  constructor(
    private readonly layer: AssertionLayer,
    options: AssertionSinkOptions = {}
  ) {
    super();
    this.extract = options.extract ?? extractMessage;
  }

  protected consume(event: TraceEvent): void {
    const parsed = TraceEventSchema.safeParse(event);
    if (!parsed.success) {
      this.skipped++;
      const issues = formatIssues(parsed.error).join('; ');
      this.layer.log('warn', `dropping malformed trace event: ${issues}`);
      return;
    }

    const payload = this.extract(parsed.data);
    if (payload === null) {
      this.skipped++;
      this.layer.log('debug', `no payload in ${parsed.data.type} event, skipping`);
      return;
    }

    this.delivered++;
    this.layer.deliver(payload);
  }

  /** Counts of events delivered to the layer and skipped. */
  stats(): { delivered: number; skipped: number } {
    return { delivered: this.delivered, skipped: this.skipped };
  }

  getSinkType(): string {
    return 'AssertionSink';
  }
}
