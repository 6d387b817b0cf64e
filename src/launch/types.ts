/** Cooperative cancellation for a launch and for the wait that follows it. */
export interface ProgressMonitor {
  isCanceled(): boolean;
  /**
   * Subscribe to cancellation. Monitors without it are polled.
   * Returns an unsubscribe function.
   */
  onCancel?(callback: () => void): () => void;
}

/** Where a launch's environment and display label come from. */
export interface LaunchConfiguration {
  readonly name: string;
  getAttribute(key: string, defaultValue: string): string;
  /**
   * The complete environment for the child, or undefined to inherit the
   * launcher's own. Fails with CoreError when a value cannot be resolved.
   */
  resolveEnvironment(): Promise<Record<string, string> | undefined>;
}
