import type { Topic } from './Topic.js';
import type { HandlerOptions, TopicHandler, TopicMessage } from './types.js';
import { BroadcastNotAllowedError } from './errors.js';

export interface TopicEventOptions {
  /** Default priority of handlers registered through the event. Default 1. */
  priority?: number;
  alias?: string;
  /** Allow triggers that skip the destination and reach generic handlers only. */
  allowBroadcast?: boolean;
}

/**
 * A named occurrence bound to one topic. Concrete kinds decide how a trigger
 * becomes a TopicMessage; delivery itself is the topic's job.
 */
export abstract class TopicEvent<TData = unknown, TInput = unknown> {
  readonly name: string;
  readonly topic: Topic<TData>;
  readonly priority: number;
  readonly alias: string | undefined;
  readonly allowBroadcast: boolean;

  constructor(name: string, topic: Topic<TData>, options: TopicEventOptions = {}) {
    this.name = name;
    this.topic = topic;
    this.priority = options.priority ?? 1;
    this.alias = options.alias;
    this.allowBroadcast = options.allowBroadcast ?? false;
  }

  abstract trigger(input: TInput): TopicMessage<TData>;

  /** Names a handler must answer to for this event's messages to reach it. */
  get routingNames(): string[] {
    return this.alias && this.alias !== this.name ? [this.name, this.alias] : [this.name];
  }

  /** Register a handler on the owning topic that answers to this event. */
  register<THandler extends TopicHandler<TData>>(handler: THandler, options: HandlerOptions = {}): THandler {
    return this.topic.register(handler, {
      ...options,
      aliases: [...(options.aliases ?? []), ...this.routingNames],
      priority: options.priority ?? this.priority,
    });
  }
}

export interface SignalInput<TData> {
  sender: string;
  data: TData;
  metadata?: Record<string, unknown>;
  /** Deliver to generic handlers only. Requires allowBroadcast. */
  broadcast?: boolean;
}

export class SignalEvent<TData = unknown> extends TopicEvent<TData, SignalInput<TData>> {
  trigger(input: SignalInput<TData>): TopicMessage<TData> {
    if (input.broadcast && !this.allowBroadcast) {
      throw new BroadcastNotAllowedError(this.name, this.topic.fullId);
    }

    const message: TopicMessage<TData> = {
      sender: input.sender,
      data: input.data,
      messageType: this.name,
      timestamp: Date.now(),
    };
    if (!input.broadcast) message.destination = this.alias ?? this.name;
    if (input.metadata) message.metadata = input.metadata;

    this.topic.publishEvent(message);
    return message;
  }
}
