import { Launch } from '../../../src/launch/launch.js';
import { InMemoryLaunchRegistry, defaultLaunchRegistry, type LaunchRegistryEvent } from '../../../src/launch/registry.js';
import { runtimeProcessFactory } from '../../../src/process/runtime-process.js';
import { FakeRawProcess, flush } from '../../helpers/fakes.js';

function launchWithProcess(): { launch: Launch; raw: FakeRawProcess } {
  const launch = new Launch(undefined);
  const raw = new FakeRawProcess();
  runtimeProcessFactory.wrap(launch, raw, 'sleep', {});
  return { launch, raw };
}

describe('Launch', () => {
  it('counts as running until it has processes and all of them exited', async () => {
    const empty = new Launch(undefined);
    expect(empty.isTerminated()).toBe(false);
    expect(empty.mode).toBe('run');

    const { launch, raw } = launchWithProcess();
    expect(launch.isTerminated()).toBe(false);
    raw.exit(0);
    await flush();
    expect(launch.isTerminated()).toBe(true);
  });

  it('hands out a copy of its process list', () => {
    const { launch } = launchWithProcess();
    const processes = launch.getProcesses();
    expect(processes).toHaveLength(1);
    expect(launch.getProcesses()).not.toBe(processes);
    expect(launch.getProcesses()).toEqual(processes);
  });

  it('terminates every process it owns', () => {
    const { launch, raw } = launchWithProcess();
    launch.terminate();
    expect(raw.kills).toEqual(['SIGTERM']);
  });
});

describe('InMemoryLaunchRegistry', () => {
  it('records launches once, in order, and reports changes', async () => {
    const registry = new InMemoryLaunchRegistry();
    const events: LaunchRegistryEvent[] = [];
    registry.onLaunchesChanged((event) => events.push(event));

    const first = launchWithProcess();
    const second = launchWithProcess();
    registry.addLaunch(first.launch);
    registry.addLaunch(second.launch);
    registry.addLaunch(first.launch);
    expect(registry.getLaunches()).toEqual([first.launch, second.launch]);

    first.raw.exit(0);
    await flush();
    expect(events).toEqual(['added', 'added', 'terminated']);
  });

  it('removes terminated launches only', async () => {
    const registry = new InMemoryLaunchRegistry();
    const done = launchWithProcess();
    const running = launchWithProcess();
    registry.addLaunch(done.launch);
    registry.addLaunch(running.launch);

    done.raw.exit(1);
    await flush();

    expect(registry.removeTerminatedLaunches()).toBe(1);
    expect(registry.getLaunches()).toEqual([running.launch]);
    expect(registry.removeLaunch(done.launch)).toBe(false);
  });

  it('stops reporting terminations of removed launches', async () => {
    const registry = new InMemoryLaunchRegistry();
    const events: LaunchRegistryEvent[] = [];
    const { launch, raw } = launchWithProcess();
    registry.addLaunch(launch);
    registry.onLaunchesChanged((event) => events.push(event));

    expect(registry.removeLaunch(launch)).toBe(true);
    raw.exit(0);
    await flush();
    expect(events).toEqual(['removed']);
  });

  it('drops launches as they terminate when asked to', async () => {
    const registry = new InMemoryLaunchRegistry({ removeOnTermination: true });
    const events: LaunchRegistryEvent[] = [];
    registry.onLaunchesChanged((event) => events.push(event));
    const { launch, raw } = launchWithProcess();
    registry.addLaunch(launch);
    expect(registry.getLaunches()).toEqual([launch]);

    raw.exit(0);
    await flush();
    expect(registry.getLaunches()).toEqual([]);
    expect(events).toEqual(['added', 'terminated', 'removed']);
  });

  it('does not keep an already terminated launch when asked to drop them', async () => {
    const registry = new InMemoryLaunchRegistry({ removeOnTermination: true });
    const { launch, raw } = launchWithProcess();
    raw.exit(0);
    await flush();

    registry.addLaunch(launch);
    expect(registry.getLaunches()).toEqual([]);
  });

  it('is the behaviour of the default registry', async () => {
    const { launch, raw } = launchWithProcess();
    defaultLaunchRegistry.addLaunch(launch);
    expect(defaultLaunchRegistry.getLaunches()).toContain(launch);

    raw.exit(0);
    await flush();
    expect(defaultLaunchRegistry.getLaunches()).not.toContain(launch);
  });
});
