import type { Receiver } from './receiver.js';

export type Unsubscribe = () => void;

/**
 * Keys of an event contract whose values are callbacks.
 *
 * A contract is a plain interface of methods, e.g.
 * `interface CameraEvents { moved(x: number, y: number): void }`.
 */
export type EventName<C> = keyof C &
  {
    [K in keyof C]-?: NonNullable<C[K]> extends (...args: never[]) => unknown ? K : never;
  }[keyof C];

// Optional callbacks (`moved?(x: number): void`) are matched without their `undefined`.
export type EventArgs<C, K extends keyof C> = NonNullable<C[K]> extends (...args: infer A extends unknown[]) => unknown
  ? A
  : never;

/** A receiver subclass that implements the contract itself. */
export type ReceiverOf<C extends object> = Receiver<C> & C;

/**
 * What an emitter does when a receiver callback throws.
 *
 * Both policies keep visiting the remaining receivers first.
 */
export type EmitErrorPolicy = 'throw' | 'report';

export interface EmitterOptions {
  name?: string;
  errorPolicy?: EmitErrorPolicy;
  // Log connect/disconnect/destroy at debug level.
  trace?: boolean;
}
