export {
  AgentEventBus,
  createEventBus,
  DEFAULT_LISTENER_BUFFER_SIZE,
} from "./events/eventBus";
export type {
  AgentEventHandler,
  EventBusConfig,
  EventBusStats,
  EventListenerHandle,
  ListenOptions,
  Subscription,
} from "./events/eventBus";
