import { ErrorStrategy } from './types.js'
import { DEFAULT_MAX_DEAD_LETTERS } from './Topic.js'

export type BrokerConfig = {
  name: string
  debug: boolean

  /** Applied to topics created through the broker unless overridden. */
  defaultErrorStrategy: ErrorStrategy
  maxDeadLetters: number
}

export const DEFAULT_BROKER_CONFIG: BrokerConfig = {
  name: 'broker',
  debug: false,
  defaultErrorStrategy: ErrorStrategy.RAISE,
  maxDeadLetters: DEFAULT_MAX_DEAD_LETTERS,
}

function parseBool(v: string | undefined, def: boolean): boolean {
  if (v === undefined) return def
  const n = v.trim().toLowerCase()
  if (n === 'true' || n === '1' || n === 'yes') return true
  if (n === 'false' || n === '0' || n === 'no') return false
  return def
}

function parseIntSafe(v: string | undefined, def: number): number {
  if (v === undefined) return def
  const n = Number.parseInt(v, 10)
  return Number.isFinite(n) ? n : def
}

function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  if (n < min) return min
  if (n > max) return max
  return n
}

const STRATEGIES = new Set<string>(Object.values(ErrorStrategy))

function isErrorStrategy(v: string): v is ErrorStrategy {
  return STRATEGIES.has(v)
}

export function parseErrorStrategy(v: string | undefined, def: ErrorStrategy): ErrorStrategy {
  if (v === undefined) return def
  const n = v.trim().toLowerCase()
  return isErrorStrategy(n) ? n : def
}

/**
 * Build BrokerConfig from environment. Never throws: unknown or malformed values
 * fall back to defaults.
 */
export function buildBrokerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const name = (env.BROKER_NAME ?? '').trim() || DEFAULT_BROKER_CONFIG.name
  const debug = parseBool(env.BROKER_DEBUG, DEFAULT_BROKER_CONFIG.debug)
  const defaultErrorStrategy = parseErrorStrategy(env.BROKER_ERROR_STRATEGY, DEFAULT_BROKER_CONFIG.defaultErrorStrategy)
  const maxDeadLetters = clampInt(
    parseIntSafe(env.BROKER_MAX_DEAD_LETTERS, DEFAULT_BROKER_CONFIG.maxDeadLetters),
    0,
    100_000
  )

  return { name, debug, defaultErrorStrategy, maxDeadLetters }
}
