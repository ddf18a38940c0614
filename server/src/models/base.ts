import type { MLTask, ResolvedBackend } from '@transformer-serve/shared';
import { RuntimeNotReadyError } from '../lib/errors';

/**
 * A servable model. Construction does no I/O; `load()` prepares it and
 * reports whether it is ready to serve.
 */
export abstract class BaseModel {
  ready = false;

  constructor(
    readonly name: string,
    readonly task: MLTask,
    readonly backend: ResolvedBackend
  ) {}

  abstract load(): Promise<boolean>;

  async stop(): Promise<void> {
    this.ready = false;
  }

  protected assertReady(): void {
    if (!this.ready) {
      throw new RuntimeNotReadyError(this.name);
    }
  }
}
