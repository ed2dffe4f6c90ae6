/**
 * Supervisor Gateway
 *
 * Thin facade over the external process supervisor. The lifecycle
 * controller only needs three verbs per process group (start, stop, status);
 * everything about how the supervisor is reached lives behind the
 * SupervisorGateway interface so tests can substitute an in-process fake.
 *
 * The bundled implementation drives supervisord through `supervisorctl`,
 * which talks to the daemon's RPC endpoint given by `-s <server_url>`.
 */

import { execa, ExecaError } from 'execa';
import type { Logger } from 'pino';
import { SwapError } from '../api/errors.js';
import { SUPERVISOR } from '../config/defaults.js';
import type { SlotId, SupervisorProcessState } from '../types/lifecycle.js';

/**
 * Capability interface consumed by the lifecycle controller.
 *
 * Every method rejects with a SwapError: `GatewayError` when the supervisor
 * itself cannot be reached, `PromotionFailed` when it answers but the
 * process group could not be started.
 */
export interface SupervisorGateway {
  start(groupName: string): Promise<void>;
  stop(groupName: string): Promise<void>;
  status(groupName: string): Promise<SupervisorProcessState>;
}

/**
 * Output of one supervisorctl invocation.
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Executes a command; injected so tests never spawn processes.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

export interface SupervisorctlGatewayConfig {
  /** supervisorctl executable (default: 'supervisorctl') */
  command?: string;
  /** Supervisor RPC endpoint, e.g. http://127.0.0.1:9999 */
  serverUrl: string;
  username?: string;
  password?: string;
  /** Per-invocation timeout (ms, default: 10000) */
  commandTimeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

const UNREACHABLE_PATTERN =
  /refused connection|connection refused|no such file|error: <class|timed out|could not connect/i;

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Default runner backed by execa. Non-zero exits are returned, not thrown:
 * supervisorctl reports per-process errors through its exit code.
 */
export const execaRunner: CommandRunner = async (file, args, options) => {
  try {
    const result = await execa(file, args, { timeout: options.timeoutMs, stripFinalNewline: true });
    return { exitCode: result.exitCode ?? 0, stdout: result.stdout, stderr: result.stderr };
  } catch (error) {
    if (error instanceof ExecaError && error.exitCode !== undefined && !error.timedOut) {
      return {
        exitCode: error.exitCode,
        stdout: textOf(error.stdout),
        stderr: textOf(error.stderr),
      };
    }
    const message = error instanceof ExecaError ? error.shortMessage : String(error);
    throw new SwapError('GatewayError', `Failed to run ${file}: ${message}`, { file, args }, {
      cause: error,
    });
  }
};

/**
 * Expand the configured group template for a model slot.
 *
 * @example
 * ```typescript
 * groupNameFor('{model}-{slot}', 'greeter', 'A'); // 'greeter-a'
 * ```
 */
export function groupNameFor(template: string, modelName: string, slot: SlotId): string {
  return template.replaceAll('{model}', modelName).replaceAll('{slot}', slot.toLowerCase());
}

/**
 * Map supervisord process states onto the gateway's coarse states.
 *
 * A group is RUNNING only when all of its processes are; any FATAL process
 * makes the whole group FATAL.
 */
export function aggregateProcessStates(states: string[]): SupervisorProcessState {
  if (states.length === 0) {
    return 'UNKNOWN';
  }
  if (states.some((state) => state === 'FATAL')) {
    return 'FATAL';
  }
  if (states.every((state) => state === 'RUNNING')) {
    return 'RUNNING';
  }
  if (states.every((state) => state === 'STOPPED' || state === 'EXITED' || state === 'STOPPING')) {
    return 'STOPPED';
  }
  return 'UNKNOWN';
}

/**
 * Parse `supervisorctl status <group>:*` output into process states.
 *
 * Lines look like `greeter-a:greeter-a_00   RUNNING   pid 812, uptime 0:03:11`.
 */
export function parseStatusOutput(output: string): string[] {
  const states: string[] = [];
  for (const line of output.split('\n')) {
    const match = /^\S+\s+([A-Z]+)\b/.exec(line.trim());
    if (match?.[1]) {
      states.push(match[1]);
    }
  }
  return states;
}

/**
 * SupervisorGateway implementation that shells out to supervisorctl.
 */
export class SupervisorctlGateway implements SupervisorGateway {
  private readonly command: string;
  private readonly baseArgs: string[];
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger?: Logger;

  constructor(config: SupervisorctlGatewayConfig) {
    this.command = config.command ?? SUPERVISOR.COMMAND;
    this.timeoutMs = config.commandTimeoutMs ?? SUPERVISOR.COMMAND_TIMEOUT_MS;
    this.runner = config.runner ?? execaRunner;
    this.logger = config.logger;
    this.baseArgs = ['-s', config.serverUrl];
    if (config.username) {
      this.baseArgs.push('-u', config.username);
    }
    if (config.password) {
      this.baseArgs.push('-p', config.password);
    }
  }

  public async start(groupName: string): Promise<void> {
    const output = await this.invoke('start', groupName);
    const lines = this.lines(output);
    const failed = lines.filter((line) => !/: started$|already started/i.test(line));
    if (failed.length > 0) {
      throw new SwapError(
        'PromotionFailed',
        `Supervisor could not start group '${groupName}': ${failed.join('; ')}`,
        { groupName, output: failed }
      );
    }
    this.logger?.info({ groupName }, 'Process group started');
  }

  public async stop(groupName: string): Promise<void> {
    const output = await this.invoke('stop', groupName);
    const lines = this.lines(output);
    const failed = lines.filter((line) => !/: stopped$|not running/i.test(line));
    if (failed.length > 0) {
      throw new SwapError(
        'GatewayError',
        `Supervisor could not stop group '${groupName}': ${failed.join('; ')}`,
        { groupName, output: failed }
      );
    }
    this.logger?.info({ groupName }, 'Process group stopped');
  }

  public async status(groupName: string): Promise<SupervisorProcessState> {
    const output = await this.invoke('status', groupName);
    if (/no such (group|process)/i.test(output)) {
      return 'UNKNOWN';
    }
    return aggregateProcessStates(parseStatusOutput(output));
  }

  private async invoke(verb: 'start' | 'stop' | 'status', groupName: string): Promise<string> {
    const args = [...this.baseArgs, verb, `${groupName}:*`];
    const result = await this.runner(this.command, args, { timeoutMs: this.timeoutMs });
    const output = [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n');

    this.logger?.debug({ verb, groupName, exitCode: result.exitCode }, 'supervisorctl finished');

    if (UNREACHABLE_PATTERN.test(output)) {
      throw new SwapError('GatewayError', `Supervisor unreachable: ${output.trim()}`, {
        verb,
        groupName,
        exitCode: result.exitCode,
      });
    }
    return output;
  }

  private lines(output: string): string[] {
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
