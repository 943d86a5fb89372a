import type { OperationStatus } from '../contracts';
import type { NewOperation } from '../db';
import { errorMessage } from '../errors';
import type { Logger } from './logger';

export interface OutcomeEvent {
  operation: string;
  source: string;
  target?: string;
  success: boolean;
  /** A non-success that is not a failure (duplicate, excluded file). */
  skipped?: boolean;
  error?: string;
}

/**
 * Anything that can persist outcomes. DatabaseManager satisfies this.
 */
export interface OperationSink {
  insertOperation(entry: NewOperation): Promise<unknown>;
}

/**
 * OutcomeRecorder - logs every file operation outcome and appends it
 * to the audit sink when one is attached.
 *
 * recordOutcome never rejects: a broken sink is reported through the
 * logger and the caller carries on.
 */
export class OutcomeRecorder {
  private readonly logger: Logger;
  private readonly sink: OperationSink | null;

  constructor(logger: Logger, sink: OperationSink | null = null) {
    this.logger = logger;
    this.sink = sink;
  }

  async recordOutcome(event: OutcomeEvent): Promise<void> {
    const status = statusOf(event);
    const arrow = event.target ? ` -> ${event.target}` : '';

    if (status === 'success') {
      this.logger.info(`${event.operation}: ${event.source}${arrow}`);
    } else if (status === 'skipped') {
      this.logger.info(`${event.operation} skipped: ${event.source}${arrow}${event.error ? ` (${event.error})` : ''}`);
    } else {
      this.logger.error(`${event.operation} failed: ${event.source}${arrow}: ${event.error ?? 'unknown error'}`);
    }

    if (!this.sink) {
      return;
    }

    try {
      await this.sink.insertOperation({
        operation: event.operation,
        source: event.source,
        target: event.target ?? null,
        status,
        error: event.error ?? null,
      });
    } catch (error) {
      this.logger.warn(`Could not write audit entry for ${event.source}: ${errorMessage(error)}`);
    }
  }
}

function statusOf(event: OutcomeEvent): OperationStatus {
  if (event.success) return 'success';
  return event.skipped ? 'skipped' : 'failed';
}
