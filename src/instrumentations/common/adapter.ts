/**
 * Base class for interception adapters: one per HTTP client, each installing a decorator
 * around that client's send entry point. apply() is idempotent and never throws.
 */

import { RecorderContext } from '../../context';
import { describeError } from '../../core/errors';
import { getLogger } from '../../core/logging/logger';
import { isProcessEnabled } from '../../core/runtime/process-switch';

export interface AdapterOptions<TTarget> {
  /** Returns the object to patch, or undefined when the client is not available. */
  loadTarget?: () => TTarget | undefined;
}

export abstract class InstrumentationAdapter<TTarget extends object> {
  abstract readonly libraryName: string;

  private applied = false;
  private readonly targetLoader?: () => TTarget | undefined;

  constructor(options: AdapterOptions<TTarget> = {}) {
    this.targetLoader = options.loadTarget;
  }

  /** Default lookup of the client when no loader was injected. */
  protected abstract defaultTarget(): TTarget | undefined;

  /** Installs the decorator on target. Must itself be idempotent (wrapper marker). */
  protected abstract patch(target: TTarget): void;

  isApplied(): boolean {
    return this.applied;
  }

  /**
   * Patches the client once. No-op when the process switch is off or the client cannot be
   * loaded; a patch failure is logged and the host keeps running unrecorded.
   */
  apply(): void {
    if (this.applied || !isProcessEnabled()) return;

    const target = this.loadTarget();
    if (!target) return;

    try {
      this.patch(target);
    } catch (err: unknown) {
      const logger = getLogger();
      logger.error(`Failed to apply ${this.libraryName} adapter: ${describeError(err)}`);
      logger.warn(`${this.libraryName} requests will not be recorded`);
      return;
    }
    this.applied = true;
    if (RecorderContext.configuration().debugLogging) {
      getLogger().debug(`${this.libraryName} adapter applied`);
    }
  }

  /**
   * Clears the applied flag only. Installed wrappers stay in place; the wrapper marker keeps
   * a later apply() from wrapping twice.
   */
  reset(): void {
    this.applied = false;
  }

  private loadTarget(): TTarget | undefined {
    try {
      return this.targetLoader ? this.targetLoader() : this.defaultTarget();
    } catch (err: unknown) {
      if (RecorderContext.configuration().debugLogging) {
        getLogger().debug(`${this.libraryName} is not available: ${describeError(err)}`);
      }
      return undefined;
    }
  }
}
