/**
 * TraceSink Abstract Class
 *
 * Base for consumers attached to a trace pipeline. The pipeline calls
 * `emit()` once per event; after `close()` a sink drops further events.
 */

import { TraceEvent } from './types';

export abstract class TraceSink {
  private closed: boolean = false;

  /**
   * Emit a trace event. Ignored once the sink is closed.
   * @param event - Trace event to emit
   */
  emit(event: TraceEvent): void {
    if (this.closed) {
      return;
    }
    this.consume(event);
  }

  /**
   * Close the sink; idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.onClose();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get unique identifier for this sink (for debugging)
   */
  abstract getSinkType(): string;

  protected abstract consume(event: TraceEvent): void;

  protected async onClose(): Promise<void> {}
}
