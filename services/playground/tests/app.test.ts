import { describe, it, expect } from 'vitest'
import { ErrorStrategy, SenderDeniedError, DEFAULT_BROKER_CONFIG } from '@topicbus/broker'
import { createLogger, makeClientBuffer, LogChannel } from '@topicbus/logging'

import { buildApp } from '../src/app.js'
import { createDashboardState, pushAlert, MAX_ALERTS } from '../src/state.js'

describe('playground dashboard', () => {
    it('wires widgets to topics end to end', async () => {
        const { broker, state, topics, widgets } = buildApp()

        widgets.refreshButton(true)
        widgets.notificationsToggle(true)
        widgets.announceInput('hello')
        widgets.mutedBanner('nope')

        expect(state.snapshots).toBe(0)
        await broker.drain()

        expect(state.refreshCount).toBe(1)
        expect(state.snapshots).toBe(1)
        expect(state.notificationCount).toBe(1)
        expect(state.notices).toEqual([{ level: 'info', text: 'Notifications enabled' }])
        expect(state.alerts).toEqual([
            'Data refresh triggered by refresh_button',
            'Notification: Notifications enabled',
            'Notification: hello'
        ])

        const denied = topics.notifications.getDeadLetters()
        expect(denied).toHaveLength(1)
        expect(denied[0]?.error).toBeInstanceOf(SenderDeniedError)

        expect(topics.dataRefresh.getMetrics()).toMatchObject({ eventsProcessed: 3, errors: 0 })
        expect(topics.notifications.getMetrics()).toMatchObject({ eventsProcessed: 4, errors: 1 })
    })

    it('runs the refresh handlers in priority order', () => {
        const { topics } = buildApp()

        expect(topics.dataRefresh.activeHandlers.map((h) => [h.name, h.priority])).toEqual([
            ['log_refresh_handler', 2],
            ['refresh_handler', 1],
            ['persist_snapshot', 0]
        ])
        expect(topics.dataRefresh.getHandler('refresh_handler')?.transactional).toBe(true)
    })

    it('keeps going after a rejected notification', () => {
        const { broker, state, topics } = buildApp()

        broker.publish('notifications', {
            sender: 'test',
            data: { level: 'info', text: '   ' },
            destination: 'notify'
        })

        expect(topics.notifications.errorStrategy).toBe(ErrorStrategy.WARN)
        expect(topics.notifications.getMetrics().errors).toBe(1)
        expect(state.notificationCount).toBe(0)
        expect(state.alerts).toEqual(['Notification:    '])
    })

    it('takes the default strategy for data_refresh from the config', () => {
        const { topics } = buildApp({ config: { ...DEFAULT_BROKER_CONFIG, defaultErrorStrategy: ErrorStrategy.IGNORE } })

        expect(topics.dataRefresh.errorStrategy).toBe(ErrorStrategy.IGNORE)
        expect(topics.notifications.errorStrategy).toBe(ErrorStrategy.WARN)
    })

    it('logs wiring and effects on their channels', () => {
        const buf = makeClientBuffer(50)
        const logger = createLogger('test', buf, { pretty: false, level: 'silent' })
        const { widgets } = buildApp({ logger })

        widgets.announceInput('hi')

        expect(buf.getLatest(50, LogChannel.app).map((l) => l.message)).toEqual([
            'kind=topics-wired refresh=data_refresh@1.0.0 notifications=notifications@1.0.0',
            'kind=app-built broker=broker topics=data_refresh,notifications'
        ])
        expect(buf.getLatest(50, LogChannel.effect).map((l) => l.message)).toEqual([
            'kind=effect-fired sender=announce_input topic=notifications'
        ])
    })
})

describe('pushAlert', () => {
    it('keeps only the most recent alerts', () => {
        const state = createDashboardState()
        for (let i = 1; i <= MAX_ALERTS + 2; i++) pushAlert(state, `alert ${i}`)

        expect(state.alerts).toHaveLength(MAX_ALERTS)
        expect(state.alerts[0]).toBe('alert 3')
        expect(state.alerts[MAX_ALERTS - 1]).toBe(`alert ${MAX_ALERTS + 2}`)
    })
})
