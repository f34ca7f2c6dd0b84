export type {
  ContextEvent,
  ContextEventType,
  ContextEventCallback,
  ContextEventFilter,
  EventBus,
} from './event-bus.js';
export { matchesFilter } from './event-bus.js';
export { LocalEventBus } from './local-event-bus.js';
