export { BaseAPIAdapter } from './base';
export type { AdapterHeaderOptions } from './base';
export { ChatCompletionsAdapter } from './chat-completions';
export { ResponsesAdapter } from './responses';
