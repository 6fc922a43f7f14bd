export * from './conversation.service.js';
export * from './state-machine.js';
export { MemorySessionStore, type SessionStore } from './session-store.js';
export { RedisSessionStore } from './state.store.js';
export type {
  Step,
  ServiceType,
  CallerSession,
  ButtonIndexMap,
  ConversationRecord,
  OptionItem,
  OutboundResponse,
  InboundMessage,
} from './state.types.js';
