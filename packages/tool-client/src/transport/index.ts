import type { ServerDescriptor } from '../types/server';
import { NetworkTransport } from './network-transport';
import { ProcessTransport } from './process-transport';
import type { Transport, TransportOptions } from './types';

export function createTransport(descriptor: ServerDescriptor, options: TransportOptions = {}): Transport {
  switch (descriptor.transport) {
    case 'process':
      return new ProcessTransport(descriptor, options);
    case 'network':
      return new NetworkTransport(descriptor, options);
  }
}

export * from './framing';
export { AsyncQueue } from './message-queue';
export { ProcessTransport, buildProcessEnv } from './process-transport';
export { NetworkTransport } from './network-transport';
export type { Transport, TransportFactory, TransportOptions } from './types';
