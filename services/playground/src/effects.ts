// services/playground/src/effects.ts
import type { Broker, TopicMessage } from '@topicbus/broker'
import type { ChannelLogger } from '@topicbus/logging'

/**
 * A widget effect: the callback a UI control fires on interaction.
 * Effects only produce messages; they know nothing about topic internals.
 */
export type Effect<TValue> = (value: TValue) => void

export interface EffectBinding<TValue, TData> {
    topicId: string
    /** Identity of the widget, checked against the topic's security lists. */
    sender: string
    destination?: string
    messageType?: string | ((value: TValue) => string)
    toData: (value: TValue) => TData
}

export function bindEffect<TValue, TData>(
    broker: Broker,
    binding: EffectBinding<TValue, TData>,
    log?: ChannelLogger
): Effect<TValue> {
    return (value: TValue): void => {
        const messageType = typeof binding.messageType === 'function'
            ? binding.messageType(value)
            : binding.messageType

        const message: TopicMessage<TData> = {
            sender: binding.sender,
            data: binding.toData(value),
            timestamp: Date.now(),
        }
        if (binding.destination !== undefined) message.destination = binding.destination
        if (messageType !== undefined) message.messageType = messageType

        log?.debug(`kind=effect-fired sender=${binding.sender} topic=${binding.topicId}`)
        broker.publish(binding.topicId, message)
    }
}
