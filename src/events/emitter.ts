import { getEventsConfig } from '../config.js';
import { logger } from '../logger.js';
import { DESTROYED, RECEIVERS, isLinked, link, unlink } from './connections.js';
import { DestroyedEndpointError, EmitError, errorMessage } from './errors.js';
import { HandlerReceiver, Receiver, createReceiver, destroyReceiver } from './receiver.js';
import type { EmitErrorPolicy, EmitterOptions, EventArgs, EventName, ReceiverOf, Unsubscribe } from './types.js';

function isCallback(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

/**
 * Synchronous multicast over an event contract `C`.
 *
 * - Receivers are called in registration order
 * - `emit` works on a snapshot: receivers connected mid-emission wait for the next one,
 *   receivers disconnected or destroyed mid-emission are skipped
 * - Neither side owns the other; destroying either end detaches both halves
 */
export class Emitter<C extends object> {
  readonly [RECEIVERS] = new Map<Receiver<C>, Partial<C>>();
  readonly name: string;
  private readonly errorPolicy: EmitErrorPolicy;
  private readonly trace: boolean;
  private destroyed = false;

  constructor(options: EmitterOptions = {}) {
    const config = getEventsConfig();
    this.name = options.name ?? 'emitter';
    this.errorPolicy = options.errorPolicy ?? config.error_policy;
    this.trace = options.trace ?? config.trace;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get receiverCount(): number {
    return this[RECEIVERS].size;
  }

  isConnected(receiver: Receiver<C>): boolean {
    return isLinked(this, receiver);
  }

  /**
   * Connect a receiver. Connecting an already connected receiver is a no-op.
   */
  connect(receiver: ReceiverOf<C> | HandlerReceiver<C>): void {
    if (this.destroyed) throw new DestroyedEndpointError('emitter', this.name);
    if (receiver[DESTROYED]) throw new DestroyedEndpointError('receiver', receiver.constructor.name);

    const target: Partial<C> = receiver instanceof HandlerReceiver ? receiver.handlers : receiver;
    if (link(this, receiver, target)) {
      this.traceLog(`connected ${receiver.constructor.name} (${this.receiverCount} receivers)`);
    }
  }

  disconnect(receiver: Receiver<C>): void {
    if (unlink(this, receiver)) {
      this.traceLog(`disconnected ${receiver.constructor.name} (${this.receiverCount} receivers)`);
    }
  }

  /**
   * Connect a plain handlers object. Returns a function that disconnects it again.
   */
  subscribe(handlers: Partial<C>): Unsubscribe {
    const receiver = createReceiver<C>(handlers);
    this.connect(receiver);
    return () => {
      destroyReceiver(receiver);
    };
  }

  emit<K extends EventName<C>>(event: K, ...args: EventArgs<C, K>): void {
    const receivers = this[RECEIVERS];
    if (receivers.size === 0) return;

    const failures: unknown[] = [];
    for (const [receiver, target] of [...receivers]) {
      // Dropped from the live map since the snapshot was taken.
      if (!receivers.has(receiver)) continue;

      const callback = target[event];
      if (!isCallback(callback)) continue;

      try {
        Reflect.apply(callback, target, args);
      } catch (error) {
        failures.push(error);
        if (this.errorPolicy === 'report') {
          logger.log({
            level: 'error',
            scope: this.name,
            message: `${receiver.constructor.name} failed handling "${String(event)}": ${errorMessage(error)}`,
            metadata: { error },
          });
        }
      }
    }

    if (failures.length > 0 && this.errorPolicy === 'throw') {
      throw new EmitError(this.name, String(event), failures);
    }
  }

  /**
   * Detach every connected receiver. Receivers are not notified.
   */
  destroy(): void {
    this.destroyed = true;
    const receivers = [...this[RECEIVERS].keys()];
    for (const receiver of receivers) {
      unlink(this, receiver);
    }
    if (receivers.length > 0) {
      this.traceLog(`destroyed with ${receivers.length} connected receivers`);
    }
  }

  private traceLog(message: string) {
    if (!this.trace) return;
    logger.log({ level: 'debug', scope: this.name, message });
  }
}
