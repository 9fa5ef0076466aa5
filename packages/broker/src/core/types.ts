/**
 * Shared contracts of the messaging core.
 *
 * The TopicMessage shape is the only contract between producers (widget effects,
 * other in-process code) and the broker. It is never serialized.
 */

export interface TopicMessage<TData = unknown> {
  /** Publisher identity; must be non-empty. */
  sender: string;

  /** Payload handed to every selected handler. */
  data: TData;

  /** Handler name or alias to target. Absent: generic handlers only. */
  destination?: string;

  /** Free-form classification. */
  messageType?: string;

  /** Epoch milliseconds. */
  timestamp?: number;

  /** Reserved. Delivery order is decided by handler priority only. */
  priority?: number;

  metadata?: Record<string, unknown>;
}

export type TopicHandler<TData = unknown> = (data: TData) => void | Promise<void>;

export enum ErrorStrategy {
  RAISE = 'raise',
  WARN = 'warn',
  IGNORE = 'ignore',
  CUSTOM = 'custom',
}

export type ErrorHandler = (error: Error, payload: unknown) => void;

export interface HandlerOptions {
  /** Registration name; defaults to the function's own name. */
  name?: string;
  aliases?: string[];
  /** Higher runs earlier. Default 0. */
  priority?: number;
  /** Receives every message regardless of destination. */
  generic?: boolean;
  /** Carried as metadata only. */
  transactional?: boolean;
  /** Overrides detection of `async function` handlers. */
  async?: boolean;
}

/** Public view of a registration, without the callable. */
export interface HandlerInfo {
  name: string;
  priority: number;
  aliases: string[];
  generic: boolean;
  isAsync: boolean;
  transactional: boolean;
}

/** Routing metadata recorded per registered callable. */
export interface HandlerStamp {
  topicId: string;
  name: string;
  priority: number;
  aliases: string[];
  transactional: boolean;
}

export interface DeadLetter {
  error: Error;
  payload: unknown;
}

export interface TopicMetrics {
  id: string;
  eventsProcessed: number;
  errors: number;
  /** Epoch ms of the last recorded outcome, null before the first one. */
  lastProcessed: number | null;
  /** Exponential moving average of successful handler latency (ms). */
  latencyAvg: number;
  handlerCount: number;
  errorRate: number;
}

export interface SecurityPolicy {
  blacklist: string[];
  whitelist: string[];
}

/** Anything a topic can hand its outbound messages to. */
export interface TopicPublisher {
  publish(topicId: string, message: TopicMessage): void;
}

/**
 * A topic as seen through the broker, whatever its payload type.
 * Method syntax keeps Topic<TData> assignable; payload typing belongs at the call
 * site, so `register` takes a handler that annotates its own parameter.
 */
export interface BrokeredTopic {
  readonly id: string;
  readonly version: string;
  readonly fullId: string;
  readonly errorStrategy: ErrorStrategy;
  readonly activeHandlers: HandlerInfo[];
  register(handler: TopicHandler<never>, options?: HandlerOptions): TopicHandler<never>;
  getHandler(nameOrAlias: string): HandlerInfo | undefined;
  publishEvent(message: TopicMessage): void;
  attach(broker: TopicPublisher): void;
  getMetrics(): TopicMetrics;
  getDeadLetters(): DeadLetter[];
  drain(): Promise<void>;
}
