import type { Emitter } from './emitter.js';
import { DESTROYED, DETACH, EMITTERS, unlink } from './connections.js';

/**
 * Base class for anything that reacts to an emitter's calls.
 *
 * Subclasses declare `implements C` and provide the callbacks; connecting and
 * disconnecting go through `Emitter.connect` / `Emitter.disconnect`.
 *
 * ```ts
 * class CameraView extends Receiver<CameraEvents> implements CameraEvents {
 *   moved(x: number, y: number) { ... }
 * }
 * camera.connect(view);
 * ```
 *
 * `destroy`, `isDestroyed`, `emitterCount` and `isConnectedTo` are reserved. A
 * contract that declares a `destroy()` callback overrides the convenience method;
 * use `destroyReceiver(receiver)` to tear such a receiver down.
 */
export abstract class Receiver<C extends object> {
  readonly [EMITTERS] = new Set<Emitter<C>>();
  [DESTROYED] = false;

  get isDestroyed(): boolean {
    return this[DESTROYED];
  }

  get emitterCount(): number {
    return this[EMITTERS].size;
  }

  isConnectedTo(emitter: Emitter<C>): boolean {
    return this[EMITTERS].has(emitter);
  }

  /**
   * Detach from every connected emitter. Safe to call from inside one of this
   * receiver's own callbacks, and more than once.
   */
  destroy(): void {
    this[DETACH]();
  }

  [DETACH](): void {
    this[DESTROYED] = true;
    // Copy first: unlink removes entries from the set being walked.
    for (const emitter of [...this[EMITTERS]]) {
      unlink(emitter, this);
    }
  }
}

/**
 * Tear a receiver down regardless of what its subclass does with `destroy`.
 */
export function destroyReceiver<C extends object>(receiver: Receiver<C>): void {
  receiver[DETACH]();
}

/**
 * Receiver whose callbacks live in a separate handlers object.
 * Events without a handler are skipped.
 */
export class HandlerReceiver<C extends object> extends Receiver<C> {
  readonly handlers: Partial<C>;

  constructor(handlers: Partial<C>) {
    super();
    this.handlers = handlers;
  }
}

export function createReceiver<C extends object>(handlers: Partial<C>): HandlerReceiver<C> {
  return new HandlerReceiver<C>(handlers);
}
