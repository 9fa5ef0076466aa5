import {
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
} from './types.js';
import {
  BrokerNotAttachedError,
  CustomHandlerFailure,
  DuplicateHandlerError,
  HandlerExecutionError,
  HandlerNotFoundError,
  MessageValidationError,
  SenderDeniedError,
  TopicConfigError,
  TopicProcessingError,
  describeError,
  toError,
  toErrorShape,
} from './errors.js';
import { formatFullId, validateHandlerName, validateTopicId, validateVersion } from './naming.js';
import { validateMessage } from './message.js';
import { answersTo, matchesDestination } from './routing.js';
import { DeadLetterBuffer } from './deadLetters.js';
import { MetricsRecorder } from './metrics.js';
import type { LoggerBundleLike, TopicTelemetry } from './telemetry.js';
import { NoopTelemetry, makeTopicTelemetry } from './telemetry.js';
import { SignalEvent, type TopicEventOptions } from './TopicEvent.js';

export const DEFAULT_TOPIC_VERSION = '1.0.0';
export const DEFAULT_MAX_DEAD_LETTERS = 100;

export interface TopicOptions {
  version?: string;
  errorStrategy?: ErrorStrategy;
  /** Invoked for every failure when errorStrategy is CUSTOM. */
  errorHandler?: ErrorHandler;
  blacklist?: Iterable<string>;
  /** When non-empty, only these senders may publish. */
  whitelist?: Iterable<string>;
  /** Capacity of the failure buffer. */
  maxDeadLetters?: number;
  broker?: TopicPublisher;
  /** Emit debug traces for this topic. */
  debug?: boolean;

  /**
   * Telemetry hooks. If omitted and `logger` is provided, telemetry is built from
   * the logger; otherwise it is a no-op.
   */
  telemetry?: TopicTelemetry;
  logger?: LoggerBundleLike;
}

/** Fields a sender closure lets the caller set on outgoing messages. */
export type SenderExtras = Pick<TopicMessage, 'messageType' | 'priority' | 'metadata'>;

export type TopicSender<TData> = (data: TData, extra?: SenderExtras) => TopicMessage<TData>;

interface HandlerRegistration<TData> {
  name: string;
  aliases: string[];
  priority: number;
  generic: boolean;
  isAsync: boolean;
  transactional: boolean;
  handler: TopicHandler<TData>;
}

function isAsyncFunction(fn: TopicHandler<never>): boolean {
  return Object.prototype.toString.call(fn) === '[object AsyncFunction]';
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

function toInfo<TData>(reg: HandlerRegistration<TData>): HandlerInfo {
  return {
    name: reg.name,
    priority: reg.priority,
    aliases: reg.aliases.slice(),
    generic: reg.generic,
    isAsync: reg.isAsync,
    transactional: reg.transactional,
  };
}

/**
 * A named, versioned channel dispatching messages to registered handlers.
 *
 * Delivery:
 * - handlers run in priority order (higher first, registration order on ties)
 * - generic handlers receive every message; others only when the destination
 *   equals their name or one of their aliases
 * - synchronous handlers run inline; async handlers are scheduled and not awaited
 *
 * Failures go through one pipeline (dead-letter buffer, metrics, strategy), whether
 * they come from a handler or from the sender security check.
 */
export class Topic<TData = unknown> implements BrokeredTopic {
  readonly id: string;
  readonly version: string;
  readonly fullId: string;
  readonly errorStrategy: ErrorStrategy;

  private readonly errorHandler: ErrorHandler | undefined;
  private readonly debug: boolean;
  private readonly telemetry: TopicTelemetry;

  // Security model
  private readonly blacklist: Set<string>;
  private readonly whitelist: Set<string>;

  private readonly handlers: HandlerRegistration<TData>[] = [];
  private readonly stamps = new WeakMap<TopicHandler<TData>, HandlerStamp>();
  private readonly events = new Map<string, SignalEvent<TData>>();

  private readonly metrics = new MetricsRecorder();
  private readonly deadLetters: DeadLetterBuffer<DeadLetter>;

  private broker: TopicPublisher | undefined;

  private inFlightHandlers = 0;
  private idleWaiters: Array<() => void> = [];
  // Held for drain(); bounded like the dead-letter buffer.
  private asyncRaised: TopicProcessingError[] = [];
  private asyncRaisedDropped = 0;
  private readonly asyncRaisedCapacity: number;

  constructor(id: string, options: TopicOptions = {}) {
    const idCheck = validateTopicId(id);
    if (!idCheck.ok) throw new TopicConfigError(`invalid topic id "${id}": ${idCheck.reason}`);

    const version = options.version ?? DEFAULT_TOPIC_VERSION;
    const versionCheck = validateVersion(version);
    if (!versionCheck.ok) throw new TopicConfigError(`invalid version for topic "${id}": ${versionCheck.reason}`);

    const capacity = options.maxDeadLetters ?? DEFAULT_MAX_DEAD_LETTERS;
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new TopicConfigError(`maxDeadLetters must be a non-negative integer (topic "${id}")`);
    }

    this.id = id;
    this.version = version;
    this.fullId = formatFullId(id, version);
    this.errorStrategy = options.errorStrategy ?? ErrorStrategy.RAISE;
    this.errorHandler = options.errorHandler;
    this.debug = options.debug ?? false;
    this.broker = options.broker;

    if (options.telemetry) {
      this.telemetry = options.telemetry;
    } else if (options.logger) {
      this.telemetry = makeTopicTelemetry(options.logger);
    } else {
      this.telemetry = NoopTelemetry;
    }

    this.blacklist = new Set(options.blacklist ?? []);
    this.whitelist = new Set(options.whitelist ?? []);
    this.deadLetters = new DeadLetterBuffer<DeadLetter>(capacity);
    this.asyncRaisedCapacity = Math.max(1, capacity);

    if (this.debug) {
      this.telemetry.debug('topic initialized', {
        topic: this.fullId,
        strategy: this.errorStrategy,
        capacity,
      });
    }
  }

  // ---------- registration ----------

  /**
   * Register a handler and return it unchanged.
   * The registry stays sorted by priority (descending), ties in registration order.
   */
  register<THandler extends TopicHandler<TData>>(handler: THandler, options: HandlerOptions = {}): THandler {
    if (typeof handler !== 'function') throw new TopicConfigError('handler must be a function');

    const name = options.name ?? handler.name;
    const nameCheck = validateHandlerName(name);
    if (!nameCheck.ok) {
      throw new TopicConfigError(
        nameCheck.reason === 'empty'
          ? `handler name is required for anonymous functions (topic ${this.fullId})`
          : `invalid handler name in topic ${this.fullId}: ${nameCheck.reason}`
      );
    }

    const aliases = [...new Set(options.aliases ?? [])];
    for (const alias of aliases) {
      const aliasCheck = validateHandlerName(alias);
      if (!aliasCheck.ok) throw new TopicConfigError(`invalid alias for handler '${name}': ${aliasCheck.reason}`);
    }

    const priority = options.priority ?? 0;
    if (!Number.isInteger(priority)) throw new TopicConfigError(`priority must be an integer (handler '${name}')`);

    if (this.handlers.some((h) => h.name === name)) throw new DuplicateHandlerError(this.fullId, name);

    const reg: HandlerRegistration<TData> = {
      name,
      aliases,
      priority,
      generic: options.generic ?? false,
      isAsync: options.async ?? isAsyncFunction(handler),
      transactional: options.transactional ?? false,
      handler,
    };

    this.insertByPriority(reg);
    this.stamps.set(handler, {
      topicId: this.fullId,
      name,
      priority,
      aliases: aliases.slice(),
      transactional: reg.transactional,
    });

    if (this.debug) {
      this.telemetry.debug('handler registered', {
        topic: this.fullId,
        handler: name,
        priority,
        generic: reg.generic,
        async: reg.isAsync,
        transactional: reg.transactional,
      });
    }

    return handler;
  }

  /** Register with default options. */
  use<THandler extends TopicHandler<TData>>(handler: THandler): THandler {
    return this.register(handler);
  }

  private insertByPriority(reg: HandlerRegistration<TData>): void {
    const idx = this.handlers.findIndex((h) => reg.priority > h.priority);
    if (idx === -1) this.handlers.push(reg);
    else this.handlers.splice(idx, 0, reg);
  }

  /** Create a named event bound to this topic. */
  addEvent(name: string, options?: TopicEventOptions): SignalEvent<TData> {
    const nameCheck = validateHandlerName(name);
    if (!nameCheck.ok) throw new TopicConfigError(`invalid event name in topic ${this.fullId}: ${nameCheck.reason}`);
    if (this.events.has(name)) throw new TopicConfigError(`event '${name}' already exists in topic ${this.fullId}`);

    const event = new SignalEvent<TData>(name, this, options);
    this.events.set(name, event);
    return event;
  }

  getEvent(name: string): SignalEvent<TData> | undefined {
    return this.events.get(name);
  }

  attach(broker: TopicPublisher): void {
    this.broker = broker;
  }

  /**
   * Closure that publishes to `handlerName` through the attached broker.
   * Without a broker the attempt is reported through the error pipeline.
   */
  sender(handlerName: string): TopicSender<TData> {
    const reg = this.handlers.find((h) => h.name === handlerName);
    if (!reg) throw new HandlerNotFoundError(this.fullId, handlerName);

    const senderId = `${this.fullId}.${reg.name}`;
    const messageType = reg.generic ? 'generic' : reg.name;

    return (data: TData, extra: SenderExtras = {}): TopicMessage<TData> => {
      const message: TopicMessage<TData> = {
        ...extra,
        sender: senderId,
        data,
        destination: reg.name,
        messageType: extra.messageType ?? messageType,
        timestamp: Date.now(),
      };

      if (!this.broker) {
        this.handleError(new BrokerNotAttachedError(this.fullId), data);
        return message;
      }

      this.broker.publish(this.id, message);
      if (this.debug) this.telemetry.debug('message sent', { topic: this.fullId, sender: senderId });
      return message;
    };
  }

  // ---------- security ----------

  isSenderAllowed(senderId: string): boolean {
    if (this.blacklist.has(senderId)) return false;
    if (this.whitelist.size > 0) return this.whitelist.has(senderId);
    return true;
  }

  addToBlacklist(senderId: string): void {
    if (this.blacklist.has(senderId)) return;
    this.blacklist.add(senderId);
    if (this.debug) this.telemetry.debug('sender blacklisted', { topic: this.fullId, sender: senderId });
  }

  removeFromBlacklist(senderId: string): void {
    if (!this.blacklist.delete(senderId)) return;
    if (this.debug) this.telemetry.debug('sender removed from blacklist', { topic: this.fullId, sender: senderId });
  }

  addToWhitelist(senderId: string): void {
    if (this.whitelist.has(senderId)) return;
    this.whitelist.add(senderId);
    if (this.debug) this.telemetry.debug('sender whitelisted', { topic: this.fullId, sender: senderId });
  }

  removeFromWhitelist(senderId: string): void {
    if (!this.whitelist.delete(senderId)) return;
    if (this.debug) this.telemetry.debug('sender removed from whitelist', { topic: this.fullId, sender: senderId });
  }

  getSecurityPolicy(): SecurityPolicy {
    return { blacklist: [...this.blacklist], whitelist: [...this.whitelist] };
  }

  // ---------- delivery ----------

  publishEvent(message: TopicMessage<TData>): void {
    const check = validateMessage(message);
    if (!check.ok) throw new MessageValidationError(this.fullId, check.reason);

    this.telemetry.published(this.fullId);

    if (!this.isSenderAllowed(message.sender)) {
      this.telemetry.senderDenied(this.fullId);
      this.updateMetrics(false);
      this.handleError(new SenderDeniedError(message.sender, this.fullId), message);
      return;
    }

    if (this.debug) {
      this.telemetry.debug('event published', {
        topic: this.fullId,
        sender: message.sender,
        destination: message.destination ?? null,
      });
    }

    this.handleEvent(message);
  }

  /**
   * Run every selected handler. Under RAISE the first failure aborts the walk and
   * surfaces as TopicProcessingError.
   */
  handleEvent(message: TopicMessage<TData>): void {
    // Snapshot: registrations made by a handler take effect from the next message.
    for (const reg of this.handlers.slice()) {
      if (!matchesDestination(reg, message.destination)) continue;

      if (reg.isAsync) {
        this.schedule(reg, message.data);
        continue;
      }
      this.invokeSync(reg, message.data);
    }
  }

  private invokeSync(reg: HandlerRegistration<TData>, data: TData): void {
    const started = performance.now();
    let result: void | Promise<void>;
    try {
      result = reg.handler(data);
    } catch (err) {
      this.recordFailure(reg, err, data);
      return;
    }

    if (isPromiseLike(result)) {
      // Declared sync but returned a promise: track it like a scheduled handler.
      this.track(reg, result, data, started);
      return;
    }
    this.recordSuccess(started);
  }

  private schedule(reg: HandlerRegistration<TData>, data: TData): void {
    const started = performance.now();
    const task = Promise.resolve().then(() => reg.handler(data));
    this.track(reg, task, data, started);
  }

  private track(reg: HandlerRegistration<TData>, pending: PromiseLike<unknown>, data: TData, started: number): void {
    this.inFlightHandlers += 1;
    void Promise.resolve(pending)
      .then(
        () => this.recordSuccess(started),
        (err: unknown) => this.settleAsyncFailure(reg, err, data)
      )
      .finally(() => {
        this.inFlightHandlers -= 1;
        this.maybeResolveIdle();
      });
  }

  private recordSuccess(started: number): void {
    this.updateMetrics(true, performance.now() - started);
    this.telemetry.delivered(this.fullId);
  }

  private recordFailure(reg: HandlerRegistration<TData>, err: unknown, data: TData): void {
    this.telemetry.handlerThrew(this.fullId);
    this.updateMetrics(false);
    this.handleError(new HandlerExecutionError(this.fullId, reg.name, err), data);
  }

  private settleAsyncFailure(reg: HandlerRegistration<TData>, err: unknown, data: TData): void {
    try {
      this.recordFailure(reg, err, data);
    } catch (raised) {
      // RAISE after the publisher already returned: surfaced by drain().
      const processing = raised instanceof TopicProcessingError ? raised : new TopicProcessingError(this.fullId, toError(raised));
      if (this.asyncRaised.length < this.asyncRaisedCapacity) {
        this.asyncRaised.push(processing);
      } else {
        this.asyncRaisedDropped += 1;
        this.telemetry.raisedDropped(this.fullId);
      }
      this.telemetry.error('async handler failed after publish returned', {
        topic: this.fullId,
        handler: reg.name,
        err: describeError(err),
      });
    }
  }

  // ---------- errors ----------

  /**
   * Record a failure and apply the topic's strategy.
   * Throws TopicProcessingError under RAISE; never throws otherwise.
   */
  handleError(error: Error, payload: unknown): void {
    if (!this.deadLetters.offer({ error, payload })) {
      this.telemetry.deadLetterDropped(this.fullId);
    }

    if (this.errorStrategy === ErrorStrategy.CUSTOM && this.errorHandler) {
      try {
        this.errorHandler(error, payload);
      } catch (err) {
        const failure = new CustomHandlerFailure(this.fullId, err);
        this.telemetry.customHandlerFailed(this.fullId);
        this.telemetry.critical('custom error handler threw', {
          topic: this.fullId,
          code: failure.code,
          err: describeError(err),
        });
      }
      return;
    }

    this.defaultErrorHandler(error);
  }

  private defaultErrorHandler(error: Error): void {
    switch (this.errorStrategy) {
      case ErrorStrategy.RAISE:
        throw new TopicProcessingError(this.fullId, error);
      case ErrorStrategy.WARN: {
        const shape = toErrorShape(error);
        this.telemetry.warn('non-critical error in topic', {
          topic: this.fullId,
          err: shape.message,
          ...(shape.code ? { code: shape.code } : {}),
        });
        return;
      }
      case ErrorStrategy.IGNORE:
      case ErrorStrategy.CUSTOM:
        // CUSTOM without a handler has nothing to call.
        return;
    }
  }

  // ---------- metrics / introspection ----------

  updateMetrics(success: boolean, latencyMs = 0): void {
    this.metrics.record(success, latencyMs);
  }

  getMetrics(): TopicMetrics {
    const m = this.metrics.snapshot();
    return {
      ...m,
      id: this.fullId,
      handlerCount: this.handlers.length,
      errorRate: m.errors / Math.max(1, m.eventsProcessed),
    };
  }

  getDeadLetters(): DeadLetter[] {
    return this.deadLetters.snapshot();
  }

  get activeHandlers(): HandlerInfo[] {
    return this.handlers.map(toInfo);
  }

  /** Lookup by name or alias. */
  getHandler(nameOrAlias: string): HandlerInfo | undefined {
    const reg = this.handlers.find((h) => answersTo(h, nameOrAlias));
    return reg ? toInfo(reg) : undefined;
  }

  /** Routing metadata recorded for a registered callable. */
  describeHandler(handler: TopicHandler<TData>): HandlerStamp | undefined {
    const stamp = this.stamps.get(handler);
    return stamp ? { ...stamp, aliases: stamp.aliases.slice() } : undefined;
  }

  // ---------- async completion ----------

  /**
   * Resolves once every scheduled async handler has settled. Rejects with the
   * TopicProcessingError(s) raised by async handlers since the previous drain:
   * a single error as is, several as an AggregateError. At most
   * max(1, maxDeadLetters) errors are held between drains; the rest are counted.
   */
  async drain(): Promise<void> {
    while (!this.isDrained()) {
      await new Promise<void>((resolve) => {
        this.idleWaiters.push(resolve);
      });
    }

    const raised = this.asyncRaised;
    const dropped = this.asyncRaisedDropped;
    this.asyncRaised = [];
    this.asyncRaisedDropped = 0;
    if (raised.length === 0) return;
    if (raised.length === 1 && dropped === 0) throw raised[0];

    const total = raised.length + dropped;
    const suffix = dropped > 0 ? ` (${dropped} not kept)` : '';
    throw new AggregateError(raised, `${total} async handlers failed in topic '${this.fullId}'${suffix}`);
  }

  private isDrained(): boolean {
    return this.inFlightHandlers === 0;
  }

  private maybeResolveIdle(): void {
    if (!this.isDrained()) return;
    const waiters = this.idleWaiters;
    if (waiters.length === 0) return;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
