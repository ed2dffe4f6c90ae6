/**
 * In-process stand-in for the process supervisor.
 */

import { SwapError } from '../../src/api/errors.js';
import type { SupervisorGateway } from '../../src/bridge/supervisor-gateway.js';
import type { SupervisorProcessState } from '../../src/types/lifecycle.js';

export type SupervisorVerb = 'start' | 'stop' | 'status';

export class FakeSupervisorGateway implements SupervisorGateway {
  public readonly calls: Array<{ verb: SupervisorVerb; group: string }> = [];
  /** Runs after a group is marked RUNNING; may override its state */
  public onStart?: (group: string) => void | Promise<void>;
  public onStop?: (group: string) => void;
  /** Groups whose start the supervisor refuses */
  public readonly refuseStart = new Set<string>();
  public unreachable = false;

  private readonly states = new Map<string, SupervisorProcessState>();

  public async start(group: string): Promise<void> {
    this.record('start', group);
    if (this.refuseStart.has(group)) {
      throw new SwapError('PromotionFailed', `Supervisor could not start group '${group}'`);
    }
    this.states.set(group, 'RUNNING');
    await this.onStart?.(group);
  }

  public async stop(group: string): Promise<void> {
    this.record('stop', group);
    this.states.set(group, 'STOPPED');
    this.onStop?.(group);
  }

  public async status(group: string): Promise<SupervisorProcessState> {
    this.record('status', group);
    return this.states.get(group) ?? 'STOPPED';
  }

  public setState(group: string, state: SupervisorProcessState): void {
    this.states.set(group, state);
  }

  public count(verb: SupervisorVerb, group: string): number {
    return this.calls.filter((call) => call.verb === verb && call.group === group).length;
  }

  private record(verb: SupervisorVerb, group: string): void {
    this.calls.push({ verb, group });
    if (this.unreachable) {
      throw new SwapError('GatewayError', 'Supervisor unreachable: connection refused');
    }
  }
}
