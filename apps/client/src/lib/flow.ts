import { format, isValid, parseISO } from 'date-fns'
import type { FlowInfo, Subscription } from '@substore/types'

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB']

export interface FlowStats {
  total: number
  enabled: number
  disabled: number
  withFlow: number
  /** Bytes, summed over subscriptions that report usage */
  totalUsed: number
  /** Bytes, summed over subscriptions that report a limit */
  totalLimit: number
  /** totalUsed / totalLimit, or null without any limit */
  usageRatio: number | null
}

/**
 * Binary-unit byte count, e.g. `1.5 GB`.
 */
export function formatBytes(bytes: number | null): string {
  if (bytes === null || !Number.isFinite(bytes) || bytes < 0) {
    return 'Unknown'
  }
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit += 1
  }
  return unit === 0 ? `${bytes} B` : `${Number(value.toFixed(1))} ${UNITS[unit]}`
}

/**
 * Percentage used: the backend's figure when present, else used / total.
 */
export function usagePercentage(flow: FlowInfo): number | null {
  if (flow.isUnlimited) {
    return null
  }
  if (flow.percentage !== null) {
    return flow.percentage
  }
  if (flow.used !== null && flow.total !== null && flow.total > 0) {
    return (flow.used / flow.total) * 100
  }
  return null
}

export function describeFlow(flow: FlowInfo | null): string {
  if (!flow) {
    return 'No flow info'
  }
  if (flow.isUnlimited) {
    return `${formatBytes(flow.used)} used (unlimited)`
  }

  let text = `${formatBytes(flow.used)} / ${formatBytes(flow.total)}`
  const percentage = usagePercentage(flow)
  if (percentage !== null) {
    text += ` (${Math.round(percentage)}%)`
  }
  if (flow.resetDate) {
    const reset = parseISO(flow.resetDate)
    if (isValid(reset)) {
      text += `, resets ${format(reset, 'yyyy-MM-dd')}`
    }
  }
  return text
}

export function computeFlowStats(subscriptions: readonly Subscription[]): FlowStats {
  let totalUsed = 0
  let totalLimit = 0
  let enabled = 0
  let withFlow = 0

  for (const sub of subscriptions) {
    if (sub.isEnabled) enabled += 1
    if (!sub.flow) continue
    withFlow += 1
    totalUsed += sub.flow.used ?? 0
    totalLimit += sub.flow.total ?? 0
  }

  return {
    total: subscriptions.length,
    enabled,
    disabled: subscriptions.length - enabled,
    withFlow,
    totalUsed,
    totalLimit,
    usageRatio: totalLimit > 0 ? totalUsed / totalLimit : null,
  }
}
