import type { Emitter } from './emitter.js';
import type { Receiver } from './receiver.js';

export const RECEIVERS: unique symbol = Symbol('multicast.receivers');
export const EMITTERS: unique symbol = Symbol('multicast.emitters');
// Receiver teardown, kept off the string namespace shared with contract callbacks.
export const DETACH: unique symbol = Symbol('multicast.detach');
export const DESTROYED: unique symbol = Symbol('multicast.destroyed');

/**
 * Connection registry shared by both endpoints.
 *
 * The emitter side maps each receiver to the object its callbacks are invoked on
 * (the receiver itself, or a separate handlers object). The receiver side only
 * remembers emitters so it can detach from all of them on destroy.
 *
 * These two functions are the only writers of either side, and each one pairs its
 * two mutations so no connection is ever visible from one side only.
 */
export function link<C extends object>(emitter: Emitter<C>, receiver: Receiver<C>, target: Partial<C>): boolean {
  const receivers = emitter[RECEIVERS];
  if (receivers.has(receiver)) return false;
  receivers.set(receiver, target);
  receiver[EMITTERS].add(emitter);
  return true;
}

export function unlink<C extends object>(emitter: Emitter<C>, receiver: Receiver<C>): boolean {
  const removed = emitter[RECEIVERS].delete(receiver);
  receiver[EMITTERS].delete(emitter);
  return removed;
}

export function isLinked<C extends object>(emitter: Emitter<C>, receiver: Receiver<C>): boolean {
  return emitter[RECEIVERS].has(receiver);
}
