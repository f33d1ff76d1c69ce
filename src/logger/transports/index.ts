export { BaseTransport } from './base';
export { ConsoleTransport } from './console';
export { MemoryTransport } from './memory';
