import { createStore, type StoreApi } from 'zustand/vanilla'

export type NotificationType = 'primary' | 'success' | 'danger' | 'warning' | 'info'

export interface Notification {
  id: string
  type: NotificationType
  message: string
  title: string | null
  /** Milliseconds until auto-dismiss; 0 keeps it until dismissed */
  duration: number
  createdAt: string
}

export interface NotifyInput {
  type?: NotificationType
  message: string
  title?: string
  duration?: number
}

export interface NotificationState {
  notifications: Notification[]
  notify: (input: NotifyInput) => string
  success: (message: string, title?: string) => string
  error: (message: string, title?: string) => string
  warning: (message: string, title?: string) => string
  info: (message: string, title?: string) => string
  dismiss: (id: string) => void
  clearAll: () => void
}

export type NotificationStore = StoreApi<NotificationState>

export interface NotificationStoreOptions {
  maxNotifications?: number
  defaultDuration?: number
}

/**
 * Transient, dismissable user-facing messages.
 */
export function createNotificationStore(
  options: NotificationStoreOptions = {}
): NotificationStore {
  const maxNotifications = options.maxNotifications ?? 5
  const defaultDuration = options.defaultDuration ?? 2500
  const timers = new Map<string, ReturnType<typeof setTimeout>>()
  let sequence = 0

  const clearTimer = (id: string) => {
    const timer = timers.get(id)
    if (timer !== undefined) {
      clearTimeout(timer)
      timers.delete(id)
    }
  }

  return createStore<NotificationState>()((set, get) => {
    const dismiss = (id: string) => {
      clearTimer(id)
      set({ notifications: get().notifications.filter((item) => item.id !== id) })
    }

    const notify = (input: NotifyInput): string => {
      sequence += 1
      const notification: Notification = {
        id: `notification-${sequence}`,
        type: input.type ?? 'primary',
        message: input.message,
        title: input.title ?? null,
        duration: input.duration ?? defaultDuration,
        createdAt: new Date().toISOString(),
      }

      const notifications = [...get().notifications, notification]
      while (notifications.length > maxNotifications) {
        const dropped = notifications.shift()
        if (dropped) clearTimer(dropped.id)
      }
      set({ notifications })

      if (notification.duration > 0) {
        const timer = setTimeout(() => dismiss(notification.id), notification.duration)
        timer.unref?.()
        timers.set(notification.id, timer)
      }
      return notification.id
    }

    return {
      notifications: [],
      notify,
      success: (message, title) => notify({ type: 'success', message, title }),
      error: (message, title) => notify({ type: 'danger', message, title }),
      warning: (message, title) => notify({ type: 'warning', message, title }),
      info: (message, title) => notify({ type: 'info', message, title }),
      dismiss,
      clearAll: () => {
        for (const id of [...timers.keys()]) clearTimer(id)
        set({ notifications: [] })
      },
    }
  })
}
