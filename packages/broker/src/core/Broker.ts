import { LogChannel } from '@topicbus/logging';

import type { BrokeredTopic, ErrorHandler, ErrorStrategy, TopicMessage, TopicPublisher } from './types.js';
import { TopicNotFoundError } from './errors.js';
import { Topic } from './Topic.js';
import { DEFAULT_BROKER_CONFIG, type BrokerConfig } from './config.js';
import type { LoggerBundleLike, TopicTelemetry } from './telemetry.js';
import { NoopTelemetry, makeTopicTelemetry } from './telemetry.js';

export interface BrokerOptions extends Partial<BrokerConfig> {
  /**
   * Telemetry shared by the broker and every topic it creates. If omitted and
   * `logger` is provided, telemetry is built from the logger.
   */
  telemetry?: TopicTelemetry;
  logger?: LoggerBundleLike;
}

export interface CreateTopicOptions {
  version?: string;
  errorStrategy?: ErrorStrategy;
  errorHandler?: ErrorHandler;
  blacklist?: Iterable<string>;
  whitelist?: Iterable<string>;
  maxDeadLetters?: number;
  debug?: boolean;
}

/**
 * Registry of topics keyed by topic id. Routes publish calls to them.
 *
 * Constructed by the application entry point and handed to the code that
 * produces messages; there is no process-wide instance.
 */
export class Broker implements TopicPublisher {
  readonly name: string;

  private readonly config: BrokerConfig;
  private readonly debug: boolean;
  private readonly telemetry: TopicTelemetry;
  private readonly topicTelemetry: TopicTelemetry;
  private readonly topics = new Map<string, BrokeredTopic>();

  constructor(options: BrokerOptions = {}) {
    const { telemetry, logger } = options;
    this.config = {
      name: options.name ?? DEFAULT_BROKER_CONFIG.name,
      debug: options.debug ?? DEFAULT_BROKER_CONFIG.debug,
      defaultErrorStrategy: options.defaultErrorStrategy ?? DEFAULT_BROKER_CONFIG.defaultErrorStrategy,
      maxDeadLetters: options.maxDeadLetters ?? DEFAULT_BROKER_CONFIG.maxDeadLetters,
    };
    this.name = this.config.name;
    this.debug = this.config.debug;

    if (telemetry) {
      this.telemetry = telemetry;
      this.topicTelemetry = telemetry;
    } else if (logger) {
      this.telemetry = makeTopicTelemetry(logger, { channel: LogChannel.broker });
      this.topicTelemetry = makeTopicTelemetry(logger, { channel: LogChannel.topic });
    } else {
      this.telemetry = NoopTelemetry;
      this.topicTelemetry = NoopTelemetry;
    }
  }

  /** Construct a topic bound to this broker and register it. */
  createTopic<TData = unknown>(id: string, options: CreateTopicOptions = {}): Topic<TData> {
    const topic = new Topic<TData>(id, {
      version: options.version,
      errorStrategy: options.errorStrategy ?? this.config.defaultErrorStrategy,
      errorHandler: options.errorHandler,
      blacklist: options.blacklist,
      whitelist: options.whitelist,
      maxDeadLetters: options.maxDeadLetters ?? this.config.maxDeadLetters,
      debug: options.debug ?? this.debug,
      broker: this,
      telemetry: this.topicTelemetry,
    });
    this.registerTopic(topic);
    return topic;
  }

  /** Register an externally constructed topic and bind it to this broker. */
  subscribe(topic: BrokeredTopic): void {
    topic.attach(this);
    this.registerTopic(topic);
  }

  /** Route a message to its topic. Unknown topic ids always throw. */
  publish<TData>(topicId: string, message: TopicMessage<TData>): void {
    const topic = this.topics.get(topicId);
    if (!topic) {
      this.telemetry.error('publish to unknown topic', { broker: this.name, topic: topicId, sender: message.sender });
      throw new TopicNotFoundError(topicId);
    }

    if (this.debug) {
      this.telemetry.debug('routing message', { broker: this.name, topic: topic.fullId, sender: message.sender });
    }
    topic.publishEvent(message);
  }

  getTopic(topicId: string): BrokeredTopic | undefined {
    return this.topics.get(topicId);
  }

  hasTopic(topicId: string): boolean {
    return this.topics.has(topicId);
  }

  topicIds(): string[] {
    return [...this.topics.keys()];
  }

  /**
   * Wait for the async handlers of every topic. One failing topic rejects with its
   * own error; several are flattened into one AggregateError.
   */
  async drain(): Promise<void> {
    const results = await Promise.allSettled([...this.topics.values()].map((t) => t.drain()));

    const rejected: unknown[] = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    if (rejected.length === 0) return;
    if (rejected.length === 1) throw rejected[0];

    const failures = rejected.flatMap((reason) => (reason instanceof AggregateError ? reason.errors : [reason]));
    throw new AggregateError(failures, `${failures.length} async handlers failed in broker '${this.name}'`);
  }

  private registerTopic(topic: BrokeredTopic): void {
    const existing = this.topics.get(topic.id);
    if (existing && existing !== topic) {
      this.telemetry.warn('replacing registered topic', {
        broker: this.name,
        topic: topic.id,
        previous: existing.fullId,
        next: topic.fullId,
      });
    }
    this.topics.set(topic.id, topic);

    if (this.debug) this.telemetry.debug('topic registered', { broker: this.name, topic: topic.fullId });
  }
}
