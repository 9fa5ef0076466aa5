import { describe, it, expect, vi } from 'vitest';
import { LogChannel } from '@topicbus/logging';

import {
  Broker,
  BrokerNotAttachedError,
  ErrorStrategy,
  HandlerNotFoundError,
  Topic,
  TopicNotFoundError,
  TopicProcessingError,
} from '../src/index.js';
import { captureLogs, expectThrown } from './helpers.js';

describe('Broker', () => {
  it('creates topics with its configured defaults', () => {
    const broker = new Broker({ name: 'main', defaultErrorStrategy: ErrorStrategy.WARN, maxDeadLetters: 2 });
    const topic = broker.createTopic<number>('jobs');
    topic.register(function fails() { throw new Error('x'); }, { generic: true });

    for (const n of [1, 2, 3]) broker.publish('jobs', { sender: 's', data: n });

    expect(broker.name).toBe('main');
    expect(topic.errorStrategy).toBe(ErrorStrategy.WARN);
    expect(topic.getDeadLetters().map((l) => l.payload)).toEqual([1, 2]);
  });

  it('lets createTopic options override the defaults', () => {
    const broker = new Broker({ defaultErrorStrategy: ErrorStrategy.WARN });
    const topic = broker.createTopic('jobs', { errorStrategy: ErrorStrategy.IGNORE, version: '2.0.0' });

    expect(topic.errorStrategy).toBe(ErrorStrategy.IGNORE);
    expect(topic.fullId).toBe('jobs@2.0.0');
  });

  it('routes by topic id', () => {
    const broker = new Broker();
    const topic = broker.createTopic<string>('chat');
    const echo = vi.fn();
    topic.register(echo, { name: 'echo' });

    broker.publish('chat', { sender: 's', data: 'hi', destination: 'echo' });

    expect(echo).toHaveBeenCalledWith('hi');
  });

  it('throws and logs for unknown topics', () => {
    const logs = captureLogs();
    const broker = new Broker({ logger: logs.logger });

    const err = expectThrown(() => broker.publish('missing', { sender: 's', data: 1 }), TopicNotFoundError);

    expect(err.message).toBe("Topic with ID 'missing' not found.");
    expect(err.code).toBe('TOPIC_NOT_FOUND');
    expect(logs.messages('error')).toEqual(['publish to unknown topic broker=broker sender=s topic=missing']);
  });

  it('propagates TopicProcessingError from RAISE topics', () => {
    const broker = new Broker();
    broker.createTopic('strict').register(function fails() { throw new Error('no'); }, { generic: true });

    expect(() => broker.publish('strict', { sender: 's', data: 1 })).toThrow(TopicProcessingError);
  });

  it('replaces a topic registered under the same id, with a warning', () => {
    const logs = captureLogs();
    const broker = new Broker({ logger: logs.logger });
    const first = broker.createTopic('dup');
    const second = broker.createTopic('dup');

    expect(broker.getTopic('dup')).toBe(second);
    expect(broker.getTopic('dup')).not.toBe(first);
    expect(broker.topicIds()).toEqual(['dup']);

    const warnings = logs.entries('warn');
    expect(warnings.map((e) => e.message)).toEqual([
      'replacing registered topic broker=broker next=dup@1.0.0 previous=dup@1.0.0 topic=dup',
    ]);
    expect(warnings[0]?.channel).toBe(LogChannel.broker);
  });

  it('lets callers register on a topic looked up by id', () => {
    const broker = new Broker();
    broker.createTopic<number>('jobs');
    const seen: number[] = [];

    const topic = broker.getTopic('jobs');
    topic?.register(function record(n: number) { seen.push(n); }, { generic: true });
    broker.publish('jobs', { sender: 's', data: 7 });

    expect(seen).toEqual([7]);
    expect(topic?.getHandler('record')?.generic).toBe(true);
    expect(topic?.activeHandlers.map((h) => h.name)).toEqual(['record']);
    expect(topic?.errorStrategy).toBe(ErrorStrategy.RAISE);
  });

  it('subscribes externally built topics', () => {
    const broker = new Broker();
    const topic = new Topic<number>('ext');
    const handler = vi.fn();
    topic.register(handler, { name: 'h' });

    broker.subscribe(topic);
    topic.sender('h')(4);

    expect(broker.hasTopic('ext')).toBe(true);
    expect(broker.hasTopic('nope')).toBe(false);
    expect(handler).toHaveBeenCalledWith(4);
  });

  it('traces routing on the broker channel in debug mode', () => {
    const logs = captureLogs();
    const broker = new Broker({ debug: true, logger: logs.logger });
    broker.createTopic('chat');

    broker.publish('chat', { sender: 's', data: 1 });

    const brokerDebug = logs
      .entries('debug')
      .filter((e) => e.channel === LogChannel.broker)
      .map((e) => e.message);
    expect(brokerDebug).toEqual([
      'topic registered broker=broker topic=chat@1.0.0',
      'routing message broker=broker sender=s topic=chat@1.0.0',
    ]);
  });

  it('drains every topic', async () => {
    const broker = new Broker();
    const seen: string[] = [];
    broker.createTopic<string>('a').register(async function ra(d) { seen.push(d); }, { generic: true });
    broker.createTopic<string>('b').register(async function rb(d) { seen.push(d); }, { generic: true });

    broker.publish('a', { sender: 's', data: 'from-a' });
    broker.publish('b', { sender: 's', data: 'from-b' });
    await broker.drain();

    expect(seen.sort()).toEqual(['from-a', 'from-b']);
  });

  it('reports async RAISE failures from every topic in one drain', async () => {
    const broker = new Broker();
    for (const id of ['a', 'b']) {
      broker.createTopic(id).register(
        async function explode() {
          throw new Error(`late in ${id}`);
        },
        { generic: true }
      );
    }

    broker.publish('a', { sender: 's', data: 1 });
    broker.publish('b', { sender: 's', data: 2 });

    const err = await broker.drain().then(
      () => undefined,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(AggregateError);
    if (!(err instanceof AggregateError)) return;
    expect(err.message).toBe("2 async handlers failed in broker 'broker'");
    expect(err.errors.map((e: unknown) => (e instanceof Error ? e.message : String(e)))).toEqual([
      "Critical error in topic 'a@1.0.0': Handler 'explode' failed in topic 'a@1.0.0': late in a",
      "Critical error in topic 'b@1.0.0': Handler 'explode' failed in topic 'b@1.0.0': late in b",
    ]);

    await expect(broker.drain()).resolves.toBeUndefined();
  });

  it('rejects drain with an async RAISE failure from any topic', async () => {
    const broker = new Broker();
    broker.createTopic('calm');
    broker.createTopic('loud').register(
      async function explode() {
        throw new Error('late');
      },
      { generic: true }
    );

    broker.publish('loud', { sender: 's', data: 1 });

    await expect(broker.drain()).rejects.toBeInstanceOf(TopicProcessingError);
  });
});

describe('Topic.sender', () => {
  it('publishes through the broker with a derived sender id', () => {
    const broker = new Broker();
    const topic = broker.createTopic<string>('chat');
    const echo = vi.fn();
    topic.register(echo, { name: 'echo' });

    const message = topic.sender('echo')('hi');

    expect(message).toMatchObject({
      sender: 'chat@1.0.0.echo',
      data: 'hi',
      destination: 'echo',
      messageType: 'echo',
    });
    expect(echo).toHaveBeenCalledWith('hi');
  });

  it('marks generic handlers and accepts extra fields', () => {
    const broker = new Broker();
    const topic = broker.createTopic<number>('chat');
    topic.register(function tap(): void {}, { generic: true });

    const send = topic.sender('tap');
    expect(send(1).messageType).toBe('generic');
    expect(send(2, { messageType: 'custom', metadata: { a: 1 } })).toMatchObject({
      messageType: 'custom',
      metadata: { a: 1 },
    });
  });

  it('rejects unknown handler names', () => {
    const topic = new Topic('chat');
    expect(() => topic.sender('ghost')).toThrow(HandlerNotFoundError);
  });

  it('reports an unattached topic through the error pipeline', () => {
    const topic = new Topic<string>('solo', { errorStrategy: ErrorStrategy.WARN });
    const handler = vi.fn();
    topic.register(handler, { name: 'h' });

    topic.sender('h')('x');

    expect(handler).not.toHaveBeenCalled();
    const [letter] = topic.getDeadLetters();
    expect(letter?.error).toBeInstanceOf(BrokerNotAttachedError);
    expect(letter?.payload).toBe('x');
  });
});
