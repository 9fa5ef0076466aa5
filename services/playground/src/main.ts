import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import { buildBrokerConfigFromEnv } from '@topicbus/broker'
import { createLogger, makeClientBuffer, LogChannel } from '@topicbus/logging'

import { buildApp } from './app.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv(): void {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

async function start(): Promise<void> {
    loadEnv()

    const logger = createLogger('playground', makeClientBuffer())
    const logApp = logger.channel(LogChannel.app)
    const logConfig = logger.channel(LogChannel.config)

    const config = buildBrokerConfigFromEnv()
    logConfig.info(
        `kind=broker-config name=${config.name} strategy=${config.defaultErrorStrategy} ` +
        `maxDeadLetters=${config.maxDeadLetters} debug=${config.debug}`
    )

    const { broker, state, topics, widgets } = buildApp({ config, logger })

    // Scripted interactions standing in for a user clicking around.
    widgets.refreshButton(true)
    widgets.notificationsToggle(false)
    widgets.announceInput('Quarterly report is ready')
    widgets.mutedBanner('this never shows')
    widgets.refreshButton(true)

    await broker.drain()

    for (const topic of [topics.dataRefresh, topics.notifications]) {
        const m = topic.getMetrics()
        logApp.info(
            `kind=topic-metrics topic=${m.id} processed=${m.eventsProcessed} errors=${m.errors} ` +
            `latencyAvgMs=${m.latencyAvg.toFixed(3)} deadLetters=${topic.getDeadLetters().length}`
        )
    }
    logApp.info(
        `kind=dashboard refreshes=${state.refreshCount} notifications=${state.notificationCount} ` +
        `snapshots=${state.snapshots} alerts=${state.alerts.length}`
    )
}

start().catch((err: unknown) => {
    const { channel } = createLogger('playground')
    channel(LogChannel.app).fatal(`failed to start err=${JSON.stringify(err instanceof Error ? err.message : String(err))}`)
    process.exitCode = 1
})
