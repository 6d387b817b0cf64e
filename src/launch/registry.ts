import type { Launch } from './launch.js';

export type LaunchRegistryEvent = 'added' | 'removed' | 'terminated';

export type LaunchRegistryListener = (event: LaunchRegistryEvent, launch: Launch) => void;

/** Records launches for later inspection. */
export interface LaunchRegistry {
  addLaunch(launch: Launch): void;
}

export interface InMemoryLaunchRegistryOptions {
  /** Remove each launch as soon as all of its processes have terminated. */
  removeOnTermination?: boolean;
}

/**
 * Process-wide list of launches, in the order they were added. Each launch
 * holds the buffered output of its processes, so unless removeOnTermination
 * is set the owner must call removeTerminatedLaunches() to release it.
 */
export class InMemoryLaunchRegistry implements LaunchRegistry {
  private readonly launches: Launch[] = [];
  private readonly unsubscribers = new Map<Launch, () => void>();
  private readonly listeners = new Set<LaunchRegistryListener>();

  constructor(private readonly options: InMemoryLaunchRegistryOptions = {}) {}

  addLaunch(launch: Launch): void {
    if (this.launches.includes(launch)) return;
    this.launches.push(launch);
    this.unsubscribers.set(
      launch,
      launch.onTerminated((l) => {
        this.notify('terminated', l);
        if (this.options.removeOnTermination) this.removeLaunch(l);
      })
    );
    this.notify('added', launch);
    if (this.options.removeOnTermination && launch.isTerminated()) this.removeLaunch(launch);
  }

  removeLaunch(launch: Launch): boolean {
    const idx = this.launches.indexOf(launch);
    if (idx === -1) return false;
    this.launches.splice(idx, 1);
    this.unsubscribers.get(launch)?.();
    this.unsubscribers.delete(launch);
    this.notify('removed', launch);
    return true;
  }

  getLaunches(): readonly Launch[] {
    return [...this.launches];
  }

  /** Drops every launch whose processes have all exited; returns how many went. */
  removeTerminatedLaunches(): number {
    const terminated = this.launches.filter((l) => l.isTerminated());
    for (const launch of terminated) this.removeLaunch(launch);
    return terminated.length;
  }

  onLaunchesChanged(listener: LaunchRegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(event: LaunchRegistryEvent, launch: Launch): void {
    for (const listener of [...this.listeners]) listener(event, launch);
  }
}

/** Shared by every launcher that is not given a registry of its own; forgets launches once they end. */
export const defaultLaunchRegistry = new InMemoryLaunchRegistry({ removeOnTermination: true });
