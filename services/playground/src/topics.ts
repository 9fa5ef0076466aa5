// services/playground/src/topics.ts
import { ErrorStrategy, type Broker, type Topic } from '@topicbus/broker'
import type { ChannelLogger } from '@topicbus/logging'

import { type DashboardState, type NoticeLevel, pushAlert } from './state.js'

export const DATA_REFRESH_TOPIC = 'data_refresh'
export const NOTIFICATIONS_TOPIC = 'notifications'
export const REFRESH_EVENT = 'refresh_requested'

export interface RefreshRequest {
    source: string
}

export interface NotificationPayload {
    level: NoticeLevel
    text: string
}

export interface DashboardTopics {
    dataRefresh: Topic<RefreshRequest>
    notifications: Topic<NotificationPayload>
}

export interface DashboardTopicOptions {
    /** Senders never allowed to notify. */
    mutedSenders?: string[]
    log?: ChannelLogger
}

/**
 * Creates the dashboard's topics on `broker` and registers their handlers.
 * Handlers only touch `state`; rendering is somebody else's job.
 */
export function wireDashboardTopics(
    broker: Broker,
    state: DashboardState,
    opts: DashboardTopicOptions = {}
): DashboardTopics {
    const dataRefresh = broker.createTopic<RefreshRequest>(DATA_REFRESH_TOPIC)
    const refresh = dataRefresh.addEvent(REFRESH_EVENT, { priority: 1 })

    refresh.register(
        function refresh_handler() {
            state.refreshCount += 1
        },
        { transactional: true }
    )

    refresh.register(
        function log_refresh_handler(req: RefreshRequest) {
            pushAlert(state, `Data refresh triggered by ${req.source}`)
        },
        { priority: 2 }
    )

    dataRefresh.register(
        async function persist_snapshot() {
            await Promise.resolve()
            state.snapshots += 1
        },
        { generic: true }
    )

    const notifications = broker.createTopic<NotificationPayload>(NOTIFICATIONS_TOPIC, {
        errorStrategy: ErrorStrategy.WARN,
        blacklist: opts.mutedSenders ?? [],
    })

    notifications.register(
        function notify(payload: NotificationPayload) {
            if (payload.text.trim().length === 0) throw new Error('empty notification')
            state.notificationCount += 1
            state.notices.push({ level: payload.level, text: payload.text })
        },
        { priority: 1 }
    )

    notifications.register(
        function generic_notification_logger(payload: NotificationPayload) {
            pushAlert(state, `Notification: ${payload.text}`)
        },
        { priority: 0, generic: true }
    )

    opts.log?.info(
        `kind=topics-wired refresh=${dataRefresh.fullId} notifications=${notifications.fullId}`
    )

    return { dataRefresh, notifications }
}
