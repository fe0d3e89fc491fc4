import { WorkflowBusyError } from '../types/errors.js';

export type Release = () => void;

/**
 * FIFO async lock. The holder's label is kept so a refused caller can be
 * told what is running.
 */
export class Mutex {
  private holder: string | undefined;
  private readonly waiters: Array<{ label: string; grant: (release: Release) => void }> = [];

  public get isLocked(): boolean {
    return this.holder !== undefined;
  }

  public get currentHolder(): string | undefined {
    return this.holder;
  }

  public acquire(label: string): Promise<Release> {
    if (this.holder === undefined) {
      return Promise.resolve(this.grant(label));
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push({ label, grant: resolve });
    });
  }

  /** Takes the lock only if it is free. */
  public tryAcquire(label: string): Release {
    if (this.holder !== undefined) {
      throw new WorkflowBusyError(this.holder);
    }
    return this.grant(label);
  }

  private grant(label: string): Release {
    this.holder = label;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.grant(this.grant(next.label));
      } else {
        this.holder = undefined;
      }
    };
  }
}
