/**
 * Event-stream envelope types.
 *
 * The backend pushes one JSON object per WebSocket message. Fields are
 * validated with zod; anything that fails validation is treated as raw text.
 */

import { z } from 'zod';

export const LogEnvelopeSchema = z.object({
  type: z.literal('log'),
  stream: z.string().nullish(),
  message: z.string().nullish(),
});

export const TaskCompletedEnvelopeSchema = z.object({
  type: z.literal('task_completed'),
  task_id: z.string().nullish(),
});

export const TaskFailedEnvelopeSchema = z.object({
  type: z.literal('task_failed'),
  task_id: z.string().nullish(),
  error: z.string().nullish(),
});

export const StreamEnvelopeSchema = z.discriminatedUnion('type', [
  LogEnvelopeSchema,
  TaskCompletedEnvelopeSchema,
  TaskFailedEnvelopeSchema,
]);

export type LogEnvelope = z.infer<typeof LogEnvelopeSchema>;
export type TaskCompletedEnvelope = z.infer<typeof TaskCompletedEnvelopeSchema>;
export type TaskFailedEnvelope = z.infer<typeof TaskFailedEnvelopeSchema>;
export type StreamEnvelope = z.infer<typeof StreamEnvelopeSchema>;

export interface LogMessage {
  type: 'log';
  /** Origin stream as sent by the backend, e.g. 'stdout' */
  stream?: string;
  message: string;
}

export interface TaskCompletedMessage {
  type: 'taskCompleted';
  taskId?: string;
}

export interface TaskFailedMessage {
  type: 'taskFailed';
  taskId?: string;
  error?: string;
}

/** Passthrough for text that is not JSON or carries an unrecognized type. */
export interface UnknownMessage {
  type: 'unknown';
  raw: string;
}

export type StreamMessage = LogMessage | TaskCompletedMessage | TaskFailedMessage | UnknownMessage;

export type StreamMessageType = StreamMessage['type'];
