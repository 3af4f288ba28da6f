/**
 * Parses complete stream messages and routes them to the output sink.
 */

import type { OutputSink } from '../utils/output-sink.js';
import { createLogger } from '../utils/logger.js';
import { StreamEnvelopeSchema, type StreamEnvelope, type StreamMessage } from './types.js';

const log = createLogger('dispatcher');

function toMessage(envelope: StreamEnvelope): StreamMessage {
  switch (envelope.type) {
    case 'log':
      return {
        type: 'log',
        stream: envelope.stream ?? undefined,
        message: envelope.message ?? '',
      };
    case 'task_completed':
      return { type: 'taskCompleted', taskId: envelope.task_id ?? undefined };
    case 'task_failed':
      return {
        type: 'taskFailed',
        taskId: envelope.task_id ?? undefined,
        error: envelope.error ?? undefined,
      };
  }
}

/**
 * Parse one logical message. Never throws: text that is not JSON, or JSON
 * that is not a known envelope, comes back as an `unknown` passthrough.
 */
export function parseStreamMessage(text: string): StreamMessage {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { type: 'unknown', raw: text };
  }

  const result = StreamEnvelopeSchema.safeParse(json);
  if (!result.success) {
    return { type: 'unknown', raw: text };
  }
  return toMessage(result.data);
}

/** Render a message as a single output line. */
export function formatStreamMessage(message: StreamMessage): string {
  switch (message.type) {
    case 'log': {
      if (message.message === '') return '';
      const stream = message.stream ? message.stream.toUpperCase() : 'LOG';
      return `[${stream}] ${message.message}`;
    }
    case 'taskCompleted':
      return `Task completed: ${message.taskId || 'unknown'}`;
    case 'taskFailed':
      return `Task failed: ${message.taskId || 'unknown'} - ${message.error || 'unknown error'}`;
    case 'unknown':
      return message.raw;
  }
}

export class StreamDispatcher {
  /** Optional structured listener, called after the sink write. */
  onMessage?: (message: StreamMessage) => void;

  constructor(private readonly sink: OutputSink) {}

  dispatch(text: string): StreamMessage {
    const message = parseStreamMessage(text);
    if (message.type === 'unknown') {
      log.debug('Passing through unrecognized stream message', { length: text.length });
    }

    try {
      this.sink.appendLine(formatStreamMessage(message));
    } catch (err) {
      log.warn('Output sink rejected a line', { error: String(err) });
    }

    if (this.onMessage) {
      try {
        this.onMessage(message);
      } catch (err) {
        log.warn('Stream message listener threw', { error: String(err) });
      }
    }

    return message;
  }
}
