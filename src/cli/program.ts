/**
 * tether CLI commands.
 *
 * Every command builds a supervisor for the configured backend, does its work,
 * and shuts the supervisor down again (stopping a backend it started).
 */

import { Command } from 'commander';
import { BackendApiClient, formatTaskResult } from '../client/api-client.js';
import { SidecarSupervisor, type SidecarSupervisorOptions } from '../supervisor/supervisor.js';
import { asError } from '../utils/errors.js';
import { StreamSink, type OutputSink } from '../utils/output-sink.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  sink?: OutputSink;
  supervisorOptions?: Omit<SidecarSupervisorOptions, 'config' | 'sink'>;
  /** Resolves when the user asks to stop (Ctrl+C by default) */
  waitForStop?: () => Promise<void>;
}

interface GlobalOptions {
  apiUrl?: string;
}

interface CliContext {
  supervisor: SidecarSupervisor;
  client: BackendApiClient;
  sink: OutputSink;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export function createProgram(deps: CliDeps = {}): Command {
  const sink = deps.sink ?? new StreamSink();
  const waitForStop = deps.waitForStop ?? waitForSignal;
  const program = new Command();

  const withContext = async (fn: (ctx: CliContext) => Promise<void>): Promise<void> => {
    const { apiUrl } = program.opts<GlobalOptions>();
    let supervisor: SidecarSupervisor | undefined;
    try {
      supervisor = new SidecarSupervisor({
        ...deps.supervisorOptions,
        config: apiUrl ? { apiUrl } : undefined,
        sink,
      });
      const client = new BackendApiClient({
        apiUrl: supervisor.config.apiUrl,
        supervisor,
        workspaceRoot: supervisor.config.workspaceRoot,
        timeoutMs: supervisor.config.requestTimeoutMs,
        fetch: deps.supervisorOptions?.fetch,
      });
      await fn({ supervisor, client, sink });
    } catch (err) {
      sink.appendLine(`Error: ${asError(err).message}`);
      process.exitCode = 1;
    } finally {
      await supervisor?.shutdown();
    }
  };

  program
    .name('tether')
    .description('Keep a local automation backend running and follow its event stream')
    .version(VERSION)
    .option('--api-url <url>', 'Backend API URL (default: $TETHER_IDE_API_URL, $TETHER_API_URL or http://127.0.0.1:8765)');

  program
    .command('watch')
    .description('Start the backend if needed and print its event stream until interrupted')
    .action(async () => {
      await withContext(async ({ supervisor }) => {
        await supervisor.ensureRunning();
        sink.appendLine(`Watching ${supervisor.config.apiUrl} (Ctrl+C to stop)`);
        await waitForStop();
        sink.appendLine('Shutting down...');
      });
    });

  program
    .command('status')
    .description('Show whether the backend is reachable')
    .option('--json', 'Print status as JSON', false)
    .action(async (options: { json: boolean }) => {
      await withContext(async ({ supervisor }) => {
        const status = await supervisor.status();
        if (options.json) {
          sink.appendLine(JSON.stringify(status));
          return;
        }

        sink.appendLine(`API: ${status.apiUrl}`);
        if (status.backend && !status.backend.exited) {
          sink.appendLine(`Backend: running (pid ${status.backend.pid ?? 'unknown'})`);
        } else {
          sink.appendLine(`Backend: ${status.backendReachable ? 'reachable' : 'not reachable'}`);
        }
        sink.appendLine(`Stream: ${status.stream}${status.streamUrl ? ` (${status.streamUrl})` : ''}`);
      });
    });

  program
    .command('run')
    .description('Submit a task and follow it until it completes')
    .argument('<task...>', 'Task description')
    .option('--task-id <id>', 'Explicit task id')
    .action(async (words: string[], options: { taskId?: string }) => {
      await withContext(async ({ supervisor, client }) => {
        // taskId -> failed; a result may arrive on the stream before the submit call returns
        const outcomes = new Map<string, boolean>();
        let notify: () => void = () => undefined;
        supervisor.onStreamMessage = (message) => {
          if ((message.type === 'taskCompleted' || message.type === 'taskFailed') && message.taskId) {
            outcomes.set(message.taskId, message.type === 'taskFailed');
            notify();
          }
        };

        const result = await client.execute(words.join(' '), options.taskId);
        formatTaskResult(result).forEach((line) => sink.appendLine(line));
        const taskId = result.task_id;
        if (!taskId) return;

        const finished = new Promise<void>((resolve) => {
          notify = () => {
            if (outcomes.has(taskId)) resolve();
          };
          notify();
        });
        await Promise.race([finished, waitForStop()]);
        if (outcomes.get(taskId)) {
          process.exitCode = 1;
        }
      });
    });

  program
    .command('models')
    .description('List available models, or select one')
    .option('--select <name>', 'Model to switch to')
    .action(async (options: { select?: string }) => {
      await withContext(async ({ client }) => {
        if (options.select) {
          sink.appendLine(await client.selectModel(options.select));
          return;
        }

        const [list, current] = await Promise.all([client.listModels(), client.currentModel()]);
        if (list.provider) {
          sink.appendLine(`Provider: ${list.provider}`);
        }
        if (list.models.length === 0) {
          sink.appendLine('No models available');
        }
        for (const name of list.models) {
          sink.appendLine(`${name === current.execution_model ? '*' : ' '} ${name}`);
        }
      });
    });

  return program;
}
