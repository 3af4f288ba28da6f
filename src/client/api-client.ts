/**
 * Backend API client
 *
 * Typed wrappers over the backend REST surface. Every request first asks the
 * supervisor to make sure the backend (and its event stream) is up; request
 * failures surface as BackendRequestError.
 */

import type { z } from 'zod';
import { DEFAULT_SIDECAR_CONFIG } from '../config/sidecar-config.js';
import { BackendRequestError, asError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { FetchLike } from '../supervisor/health.js';
import {
  CancelTaskResponseSchema,
  CurrentModelResponseSchema,
  ErrorEnvelopeSchema,
  ModelListSchema,
  SelectModelResponseSchema,
  TaskListResponseSchema,
  TaskResultSchema,
  TaskStatusResponseSchema,
  type CurrentModel,
  type ModelList,
  type TaskInfo,
  type TaskResult,
} from './schemas.js';

export interface BackendGate {
  ensureRunning(): Promise<void>;
}

export interface BackendApiClientOptions {
  apiUrl: string;
  supervisor: BackendGate;
  /** Sent as `cwd` with task submissions */
  workspaceRoot?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface LineRange {
  startLine: number;
  endLine: number;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

const log = createLogger('api-client');

export class BackendApiClient {
  private readonly baseUrl: string;
  private readonly supervisor: BackendGate;
  private readonly workspaceRoot?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: BackendApiClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, '');
    this.supervisor = options.supervisor;
    this.workspaceRoot = options.workspaceRoot;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SIDECAR_CONFIG.requestTimeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  execute(task: string, taskId?: string): Promise<TaskResult> {
    return this.request('POST', '/api/v1/execute', TaskResultSchema, {
      task,
      task_id: taskId,
      cwd: this.workspaceRoot,
    });
  }

  analyze(filePath: string): Promise<TaskResult> {
    return this.request('POST', '/api/v1/analyze', TaskResultSchema, this.fileBody(filePath));
  }

  generateTests(filePath: string): Promise<TaskResult> {
    return this.request('POST', '/api/v1/test', TaskResultSchema, this.fileBody(filePath));
  }

  refactor(filePath: string, range?: LineRange): Promise<TaskResult> {
    return this.request('POST', '/api/v1/refactor', TaskResultSchema, this.fileBody(filePath, range));
  }

  debug(filePath: string, errorMessage?: string): Promise<TaskResult> {
    return this.request('POST', '/api/v1/debug', TaskResultSchema, {
      ...this.fileBody(filePath),
      error_message: errorMessage || undefined,
    });
  }

  document(filePath: string, range?: LineRange): Promise<TaskResult> {
    return this.request('POST', '/api/v1/document', TaskResultSchema, this.fileBody(filePath, range));
  }

  async taskStatus(taskId: string): Promise<TaskInfo> {
    const response = await this.request(
      'GET',
      `/api/v1/status/${encodeURIComponent(taskId)}`,
      TaskStatusResponseSchema
    );
    return response.task;
  }

  async listTasks(): Promise<TaskInfo[]> {
    const response = await this.request('GET', '/api/v1/tasks', TaskListResponseSchema);
    return response.tasks;
  }

  async cancelTask(taskId: string): Promise<string | undefined> {
    const response = await this.request(
      'DELETE',
      `/api/v1/task/${encodeURIComponent(taskId)}`,
      CancelTaskResponseSchema
    );
    return response.message;
  }

  listModels(): Promise<ModelList> {
    return this.request('GET', '/api/v1/models', ModelListSchema);
  }

  async currentModel(): Promise<CurrentModel> {
    const response = await this.request('GET', '/api/v1/models/current', CurrentModelResponseSchema);
    return response.current_model;
  }

  async selectModel(modelName: string): Promise<string> {
    const response = await this.request('POST', '/api/v1/models/select', SelectModelResponseSchema, {
      model_name: modelName,
    });
    return response.message ?? `Model changed to ${modelName}`;
  }

  private fileBody(filePath: string, range?: LineRange): Record<string, unknown> {
    return {
      file_path: filePath,
      start_line: range?.startLine,
      end_line: range?.endLine,
      cwd: this.workspaceRoot,
    };
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown>
  ): Promise<T> {
    await this.supervisor.ensureRunning();

    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: body ? { 'Content-Type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      log.warn('Backend request failed', { method, path, error: asError(err).message });
      throw new BackendRequestError('backend is not responding');
    } finally {
      clearTimeout(timeout);
    }

    const payload: unknown = await response.json().catch(() => undefined);
    const envelope = ErrorEnvelopeSchema.safeParse(payload);
    if (!response.ok || (envelope.success && envelope.data.status === 'error')) {
      const message = (envelope.success && envelope.data.message) || `HTTP ${response.status}`;
      log.debug('Backend returned an error', { method, path, status: response.status, message });
      throw new BackendRequestError(message, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new BackendRequestError(`Unexpected response from ${path}`, response.status);
    }
    return parsed.data;
  }
}

/** Output lines describing a task submission result. */
export function formatTaskResult(result: TaskResult): string[] {
  if (result.status === 'error') {
    return [`Error: ${result.message ?? 'unknown error'}`];
  }

  const lines: string[] = [];
  if (result.task_id) {
    lines.push(`Task ID: ${result.task_id}`);
  }
  if (result.result !== undefined && result.result !== null) {
    lines.push(`Result: ${JSON.stringify(result.result, null, 2)}`);
  }
  return lines;
}
