import { classifyActions } from './action-classifier.js'
import type { EffectiveAction } from './action-classifier.js'
import { UNKNOWN_ADDRESS } from './schemas.js'

export interface ResourceChangeRecord {
  readonly address?: string | undefined
  readonly change?: { readonly actions?: readonly string[] | null | undefined } | null | undefined
}

/**
 * Resource addresses grouped by effective action. Groups keep first-seen order,
 * addresses keep input order.
 */
export type Summary = ReadonlyMap<EffectiveAction, readonly string[]>

export function aggregateChanges(records: readonly ResourceChangeRecord[]): Summary {
  const groups = new Map<EffectiveAction, string[]>()

  for (const record of records) {
    const actions = record.change ? (record.change.actions ?? []) : []
    const address = record.address ?? UNKNOWN_ADDRESS
    const action = classifyActions(actions)

    const group = groups.get(action)
    if (group) {
      group.push(address)
    } else {
      groups.set(action, [address])
    }
  }

  return groups
}

export function summaryFromEntries(entries: Record<string, readonly string[]>): Summary {
  return new Map(Object.entries(entries))
}

export function totalResources(summary: Summary): number {
  let total = 0
  for (const addresses of summary.values()) {
    total += addresses.length
  }
  return total
}
