import type { LogEntry } from './types.js';

export type ShutdownTask = () => Promise<void> | void;

/** Owns the process-wide abort signal and the cleanup tasks run on SIGINT or SIGTERM. */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { reason?: string; logger?: (entry: LogEntry) => void } = {}): Promise<void> {
    if (this.shutdownPromise !== undefined) {
      await this.shutdownPromise;
      return;
    }
    this.shutdownPromise = this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { reason?: string; logger?: (entry: LogEntry) => void }): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.abortController.abort(new Error(opts.reason ?? 'shutdown requested'));
    const logger = opts.logger;
    // registration order reversed
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          type: 'agent',
          direction: 'event',
          remoteIdentifier: 'agent:shutdown',
          fatal: false,
          message: `shutdown task '${name}' failed: ${message}`,
        });
      }
    }
  }
}
