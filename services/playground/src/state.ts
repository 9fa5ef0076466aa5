// services/playground/src/state.ts

export type NoticeLevel = 'info' | 'success' | 'warning' | 'error'

export interface Notice {
    level: NoticeLevel
    text: string
}

export interface DashboardState {
    refreshCount: number
    notificationCount: number
    /** Most recent activity lines, oldest first. */
    alerts: string[]
    notices: Notice[]
    snapshots: number
}

export const MAX_ALERTS = 10

export function createDashboardState(): DashboardState {
    return {
        refreshCount: 0,
        notificationCount: 0,
        alerts: [],
        notices: [],
        snapshots: 0,
    }
}

export function pushAlert(state: DashboardState, text: string): void {
    state.alerts.push(text)
    if (state.alerts.length > MAX_ALERTS) state.alerts.splice(0, state.alerts.length - MAX_ALERTS)
}
