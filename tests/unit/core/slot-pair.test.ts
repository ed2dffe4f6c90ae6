import { describe, it, expect } from 'vitest';
import type { SlotBinder } from '../../../src/core/artifact-store.js';
import { ModelSlotPair } from '../../../src/core/slot-pair.js';
import { WorkerProcessHandle } from '../../../src/core/worker-handle.js';
import { WorkerHealth, type ArtifactVersion, type SlotId } from '../../../src/types/lifecycle.js';
import { artifactVersion } from '../../helpers/artifacts.js';
import { FakeSupervisorGateway } from '../../helpers/fake-supervisor.js';
import { FakeWorkerClient } from '../../helpers/fake-workers.js';

function createPair(binder?: SlotBinder) {
  const gateway = new FakeSupervisorGateway();
  const client = new FakeWorkerClient();
  const handle = (slot: SlotId, port: number) =>
    new WorkerProcessHandle({
      modelName: 'greeter',
      slot,
      groupName: `greeter-${slot.toLowerCase()}`,
      baseUrl: `http://127.0.0.1:${port}`,
      unhealthyThreshold: 1,
      client,
    });
  const pair = new ModelSlotPair({
    modelName: 'greeter',
    slotA: handle('A', 7000),
    slotB: handle('B', 7001),
    gateway,
    binder,
  });
  return { gateway, client, pair };
}

async function bringReady(
  pair: ModelSlotPair,
  client: FakeWorkerClient,
  slot: SlotId,
  version: number
): Promise<void> {
  await pair.startSlot(slot, artifactVersion('greeter', version));
  client.bringUp(pair.get(slot).baseUrl);
  await pair.pollReady(slot);
}

describe('ModelSlotPair', () => {
  it('rejects handles in the wrong positions', () => {
    const client = new FakeWorkerClient();
    const b = new WorkerProcessHandle({
      modelName: 'greeter',
      slot: 'B',
      groupName: 'greeter-b',
      baseUrl: 'http://127.0.0.1:7001',
      unhealthyThreshold: 1,
      client,
    });
    expect(
      () =>
        new ModelSlotPair({
          modelName: 'greeter',
          slotA: b,
          slotB: b,
          gateway: new FakeSupervisorGateway(),
        })
    ).toThrow('Slot pair requires handles for slots A and B');
  });

  it('starts empty with slot A as standby', () => {
    const { pair } = createPair();

    expect(pair.activeSlot()).toBeNull();
    expect(pair.activeHandle()).toBeNull();
    expect(pair.standbySlot()).toBe('A');
    expect(pair.activeCount()).toBe(0);
  });

  it('refuses to promote a slot that has not passed readiness', async () => {
    const { pair } = createPair();
    await pair.startSlot('A', artifactVersion('greeter', 1));

    expect(() => pair.promote('A')).toThrow(/Cannot promote slot A/);
    expect(pair.activeSlot()).toBeNull();
  });

  it('swaps the active pointer and returns the previous slot', async () => {
    const { pair, client } = createPair();
    await bringReady(pair, client, 'A', 1);
    expect(pair.promote('A')).toBeNull();
    expect(pair.standbySlot()).toBe('B');

    await bringReady(pair, client, 'B', 2);
    expect(pair.promote('B')).toBe('A');
    expect(pair.activeSlot()).toBe('B');
    expect(pair.activeHandle()?.getVersion()?.version).toBe(2);
    expect(pair.activeCount()).toBe(1);
  });

  it('stops a group left running before starting it again', async () => {
    const { pair, gateway } = createPair();
    gateway.setState('greeter-a', 'RUNNING');

    await pair.startSlot('A', artifactVersion('greeter', 1));

    expect(gateway.calls).toEqual([
      { verb: 'status', group: 'greeter-a' },
      { verb: 'stop', group: 'greeter-a' },
      { verb: 'start', group: 'greeter-a' },
    ]);
    expect(pair.get('A').getHealth()).toBe(WorkerHealth.STARTING);
  });

  it('binds the artifact before starting the process', async () => {
    const order: string[] = [];
    const binder: SlotBinder = {
      bindSlot: async (_model: string, slot: SlotId, version: ArtifactVersion) => {
        order.push(`bind ${slot} v${version.version}`);
      },
    };
    const { pair, gateway } = createPair(binder);
    gateway.onStart = (group) => {
      order.push(`start ${group}`);
    };

    await pair.startSlot('B', artifactVersion('greeter', 3));

    expect(order).toEqual(['bind B v3', 'start greeter-b']);
  });

  it('refuses to stop the active slot', async () => {
    const { pair, client, gateway } = createPair();
    await bringReady(pair, client, 'A', 1);
    pair.promote('A');

    await expect(pair.stopSlot('A')).rejects.toThrow('Refusing to stop active slot A');
    expect(gateway.count('stop', 'greeter-a')).toBe(0);
  });

  it('marks a slot stopped even when the supervisor call fails', async () => {
    const { pair, gateway } = createPair();
    await pair.startSlot('B', artifactVersion('greeter', 1));
    gateway.unreachable = true;

    await expect(pair.stopSlot('B')).rejects.toMatchObject({ code: 'GatewayError' });
    expect(pair.get('B').getHealth()).toBe(WorkerHealth.STOPPED);
  });

  it('restarts a slot with the artifact it already holds', async () => {
    const { pair, client, gateway } = createPair();
    await bringReady(pair, client, 'A', 4);
    pair.promote('A');

    await pair.restartSlot('A');

    expect(pair.get('A').getHealth()).toBe(WorkerHealth.STARTING);
    expect(pair.get('A').getVersion()?.version).toBe(4);
    expect(gateway.count('start', 'greeter-a')).toBe(2);
  });
});
