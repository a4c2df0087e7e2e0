export { Emitter } from './emitter.js';
export { Receiver, HandlerReceiver, createReceiver, destroyReceiver } from './receiver.js';
export { DestroyedEndpointError, EmitError } from './errors.js';
export type { EmitErrorPolicy, EmitterOptions, EventArgs, EventName, ReceiverOf, Unsubscribe } from './types.js';
