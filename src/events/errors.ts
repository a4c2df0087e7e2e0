/**
 * Thrown when connecting an endpoint that has already been destroyed.
 */
export class DestroyedEndpointError extends Error {
  readonly endpoint: 'emitter' | 'receiver';

  constructor(endpoint: 'emitter' | 'receiver', name: string) {
    super(`Cannot connect: ${endpoint} "${name}" has been destroyed`);
    this.name = 'DestroyedEndpointError';
    this.endpoint = endpoint;
  }
}

/**
 * Raised after an emission finished visiting every receiver, when one or more
 * callbacks threw along the way. `errors` holds each failure in dispatch order.
 */
export class EmitError extends AggregateError {
  readonly event: string;
  readonly emitter: string;

  constructor(emitter: string, event: string, errors: unknown[]) {
    const noun = errors.length === 1 ? 'receiver' : 'receivers';
    super(errors, `${errors.length} ${noun} failed handling "${event}" on ${emitter}`);
    this.name = 'EmitError';
    this.event = event;
    this.emitter = emitter;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
