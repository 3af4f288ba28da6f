/**
 * Response schemas for the backend REST API.
 *
 * The backend wraps every answer in `{ status, ... }`; failures carry
 * `{ status: 'error', message }`. Unknown fields are kept.
 */

import { z } from 'zod';

export const ErrorEnvelopeSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
});

export const TaskResultSchema = z
  .object({
    status: z.string(),
    task_id: z.string().optional(),
    message: z.string().optional(),
    result: z.unknown().optional(),
  })
  .passthrough();

export type TaskResult = z.infer<typeof TaskResultSchema>;

export const TaskInfoSchema = z
  .object({
    id: z.string(),
    task: z.string(),
    status: z.string(),
    started_at: z.string().optional(),
    completed_at: z.string().optional(),
    result: z.unknown().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type TaskInfo = z.infer<typeof TaskInfoSchema>;

export const TaskStatusResponseSchema = z.object({
  status: z.string(),
  task: TaskInfoSchema,
});

export const TaskListResponseSchema = z.object({
  tasks: z.array(TaskInfoSchema),
});

export const CancelTaskResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

export const ModelListSchema = z.object({
  models: z.array(z.string()).default([]),
  provider: z.string().optional(),
  note: z.string().optional(),
});

export type ModelList = z.infer<typeof ModelListSchema>;

export const CurrentModelSchema = z.object({
  execution_model: z.string().nullable(),
  planning_model: z.string().nullable(),
  research_model: z.string().nullable(),
  provider: z.string().nullable(),
});

export type CurrentModel = z.infer<typeof CurrentModelSchema>;

export const CurrentModelResponseSchema = z.object({
  status: z.string(),
  current_model: CurrentModelSchema,
});

export const SelectModelResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  model: z.string().optional(),
});
