// packages/broker/src/core/errors.ts

export type BrokerErrorCode =
  | 'SENDER_DENIED'
  | 'HANDLER_FAILED'
  | 'CUSTOM_HANDLER_FAILED'
  | 'TOPIC_NOT_FOUND'
  | 'TOPIC_PROCESSING'
  | 'INVALID_MESSAGE'
  | 'DUPLICATE_HANDLER'
  | 'HANDLER_NOT_FOUND'
  | 'INVALID_TOPIC_CONFIG'
  | 'BROADCAST_NOT_ALLOWED'
  | 'BROKER_NOT_ATTACHED'

export type ErrorShape = {
  message: string
  code?: string
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

export function toErrorShape(err: unknown): ErrorShape {
  if (err instanceof BrokerError) return { message: err.message, code: err.code }
  if (err instanceof Error) {
    const code: unknown = Reflect.get(err, 'code')
    return { message: err.message, code: typeof code === 'string' ? code : undefined }
  }
  return { message: String(err) }
}

export class BrokerError extends Error {
  readonly code: BrokerErrorCode

  constructor(code: BrokerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** A publish was refused by the topic's blacklist/whitelist. */
export class SenderDeniedError extends BrokerError {
  constructor(readonly sender: string, readonly topicId: string) {
    super('SENDER_DENIED', `Sender '${sender}' blocked by security policy in topic '${topicId}'`)
  }
}

/** A handler threw (or its promise rejected). `cause` holds the original value. */
export class HandlerExecutionError extends BrokerError {
  constructor(readonly topicId: string, readonly handlerName: string, cause: unknown) {
    super('HANDLER_FAILED', `Handler '${handlerName}' failed in topic '${topicId}': ${describeError(cause)}`, { cause })
  }
}

/** The CUSTOM error handler itself threw. Logged, never propagated. */
export class CustomHandlerFailure extends BrokerError {
  constructor(readonly topicId: string, cause: unknown) {
    super('CUSTOM_HANDLER_FAILED', `Error in custom error handler for topic '${topicId}': ${describeError(cause)}`, { cause })
  }
}

export class TopicNotFoundError extends BrokerError {
  constructor(readonly topicId: string) {
    super('TOPIC_NOT_FOUND', `Topic with ID '${topicId}' not found.`)
  }
}

/** Raised to the publisher under ErrorStrategy.RAISE. */
export class TopicProcessingError extends BrokerError {
  constructor(readonly topicId: string, cause: Error) {
    super('TOPIC_PROCESSING', `Critical error in topic '${topicId}': ${cause.message}`, { cause })
  }
}

export class MessageValidationError extends BrokerError {
  constructor(readonly topicId: string, readonly reason: string) {
    super('INVALID_MESSAGE', `Invalid message for topic '${topicId}': ${reason}`)
  }
}

export class DuplicateHandlerError extends BrokerError {
  constructor(readonly topicId: string, readonly handlerName: string) {
    super('DUPLICATE_HANDLER', `Handler '${handlerName}' already exists in topic ${topicId}`)
  }
}

export class HandlerNotFoundError extends BrokerError {
  constructor(readonly topicId: string, readonly handlerName: string) {
    super('HANDLER_NOT_FOUND', `No handler '${handlerName}' registered in topic ${topicId}`)
  }
}

export class TopicConfigError extends BrokerError {
  constructor(message: string) {
    super('INVALID_TOPIC_CONFIG', message)
  }
}

export class BroadcastNotAllowedError extends BrokerError {
  constructor(readonly eventName: string, readonly topicId: string) {
    super('BROADCAST_NOT_ALLOWED', `Event '${eventName}' in topic '${topicId}' does not allow broadcast`)
  }
}

export class BrokerNotAttachedError extends BrokerError {
  constructor(readonly topicId: string) {
    super('BROKER_NOT_ATTACHED', `No broker assigned to topic ${topicId}. Cannot send message.`)
  }
}
