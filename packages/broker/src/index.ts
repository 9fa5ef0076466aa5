export { Broker, type BrokerOptions, type CreateTopicOptions } from './core/Broker.js';
export {
  Topic,
  DEFAULT_MAX_DEAD_LETTERS,
  DEFAULT_TOPIC_VERSION,
  type SenderExtras,
  type TopicOptions,
  type TopicSender,
} from './core/Topic.js';
export { TopicEvent, SignalEvent, type SignalInput, type TopicEventOptions } from './core/TopicEvent.js';
export {
  ErrorStrategy,
  type BrokeredTopic,
  type DeadLetter,
  type ErrorHandler,
  type HandlerInfo,
  type HandlerOptions,
  type HandlerStamp,
  type SecurityPolicy,
  type TopicHandler,
  type TopicMessage,
  type TopicMetrics,
  type TopicPublisher,
} from './core/types.js';
export {
  BroadcastNotAllowedError,
  BrokerError,
  BrokerNotAttachedError,
  CustomHandlerFailure,
  DuplicateHandlerError,
  HandlerExecutionError,
  HandlerNotFoundError,
  MessageValidationError,
  SenderDeniedError,
  TopicConfigError,
  TopicNotFoundError,
  TopicProcessingError,
  toErrorShape,
  type BrokerErrorCode,
  type ErrorShape,
} from './core/errors.js';
export { validateMessage, isTopicMessage, type MessageValidationResult } from './core/message.js';
export { validateTopicId, validateVersion, validateHandlerName } from './core/naming.js';
export {
  NoopTelemetry,
  makeTopicTelemetry,
  type LoggerBundleLike,
  type TopicTelemetry,
  type TopicTelemetryCounters,
  type TopicTelemetryWithCounters,
} from './core/telemetry.js';
export {
  buildBrokerConfigFromEnv,
  parseErrorStrategy,
  DEFAULT_BROKER_CONFIG,
  type BrokerConfig,
} from './core/config.js';
