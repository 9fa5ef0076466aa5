import type { TopicMessage } from './types.js';

export type MessageValidationResult =
  | { ok: true }
  | { ok: false; reason: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Boundary check applied by Topic.publishEvent. Only `sender` is mandatory;
 * optional fields are checked for type when present.
 */
export function validateMessage(message: unknown): MessageValidationResult {
  if (!isRecord(message)) return { ok: false, reason: 'not_an_object' };

  const sender = message.sender;
  if (typeof sender !== 'string') return { ok: false, reason: 'missing_sender' };
  if (sender.trim().length === 0) return { ok: false, reason: 'empty_sender' };
  if (!('data' in message)) return { ok: false, reason: 'missing_data' };

  const { destination, messageType, timestamp, priority, metadata } = message;
  if (destination !== undefined && typeof destination !== 'string') {
    return { ok: false, reason: 'destination_not_a_string' };
  }
  if (messageType !== undefined && typeof messageType !== 'string') {
    return { ok: false, reason: 'message_type_not_a_string' };
  }
  if (timestamp !== undefined && (typeof timestamp !== 'number' || !Number.isFinite(timestamp))) {
    return { ok: false, reason: 'timestamp_not_a_number' };
  }
  if (priority !== undefined && !Number.isInteger(priority)) {
    return { ok: false, reason: 'priority_not_an_integer' };
  }
  if (metadata !== undefined && !isRecord(metadata)) {
    return { ok: false, reason: 'metadata_not_an_object' };
  }
  return { ok: true };
}

export function isTopicMessage(value: unknown): value is TopicMessage {
  return validateMessage(value).ok;
}
