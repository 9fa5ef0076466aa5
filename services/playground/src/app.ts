import { Broker, DEFAULT_BROKER_CONFIG, type BrokerConfig } from '@topicbus/broker'
import { LogChannel, type LoggerBundle } from '@topicbus/logging'

import { bindEffect, type Effect } from './effects.js'
import { createDashboardState, type DashboardState } from './state.js'
import {
    DATA_REFRESH_TOPIC,
    NOTIFICATIONS_TOPIC,
    REFRESH_EVENT,
    wireDashboardTopics,
    type DashboardTopics,
    type NotificationPayload,
    type RefreshRequest
} from './topics.js'

export interface DashboardWidgets {
    refreshButton: Effect<boolean>
    notificationsToggle: Effect<boolean>
    /** Free-text box whose messages reach generic handlers only. */
    announceInput: Effect<string>
    mutedBanner: Effect<string>
}

export interface PlaygroundApp {
    broker: Broker
    state: DashboardState
    topics: DashboardTopics
    widgets: DashboardWidgets
}

export interface BuildAppOptions {
    config?: BrokerConfig
    logger?: LoggerBundle
}

export const MUTED_SENDER = 'muted_banner'

/**
 * The application entry point owns the broker; everything else receives it.
 */
export function buildApp(opts: BuildAppOptions = {}): PlaygroundApp {
    const config = opts.config ?? DEFAULT_BROKER_CONFIG
    const logApp = opts.logger?.channel(LogChannel.app)
    const logEffect = opts.logger?.channel(LogChannel.effect)

    const broker = new Broker({ ...config, logger: opts.logger })
    const state = createDashboardState()
    const topics = wireDashboardTopics(broker, state, {
        mutedSenders: [MUTED_SENDER],
        log: logApp
    })

    const widgets: DashboardWidgets = {
        refreshButton: bindEffect<boolean, RefreshRequest>(broker, {
            topicId: DATA_REFRESH_TOPIC,
            sender: 'refresh_button',
            destination: REFRESH_EVENT,
            toData: () => ({ source: 'refresh_button' })
        }, logEffect),

        notificationsToggle: bindEffect<boolean, NotificationPayload>(broker, {
            topicId: NOTIFICATIONS_TOPIC,
            sender: 'settings',
            destination: 'notify',
            messageType: 'info',
            toData: (on) => ({ level: 'info', text: `Notifications ${on ? 'enabled' : 'disabled'}` })
        }, logEffect),

        announceInput: bindEffect<string, NotificationPayload>(broker, {
            topicId: NOTIFICATIONS_TOPIC,
            sender: 'announce_input',
            messageType: 'announcement',
            toData: (text) => ({ level: 'info', text })
        }, logEffect),

        mutedBanner: bindEffect<string, NotificationPayload>(broker, {
            topicId: NOTIFICATIONS_TOPIC,
            sender: MUTED_SENDER,
            destination: 'notify',
            toData: (text) => ({ level: 'warning', text })
        }, logEffect)
    }

    logApp?.info(`kind=app-built broker=${broker.name} topics=${broker.topicIds().join(',')}`)

    return { broker, state, topics, widgets }
}
