import type { Summary } from '../core/change-aggregator.js'
import { actionStyle } from './palette.js'
import { cell } from './table-document.js'
import type { TableDocument, TableRow } from './table-document.js'

export const CHANGES_TITLE = 'Resource Changes'

/**
 * Sorted addresses per effective action. `no-op` resources are left out, they
 * only show up in the statistics.
 */
export function buildChanges(summary: Summary, colorEnabled = false): TableDocument {
  const rows: TableRow[] = []

  for (const action of [...summary.keys()].sort()) {
    const addresses = summary.get(action) ?? []
    if (action === 'no-op' || addresses.length === 0) {
      continue
    }

    // each line of a multi-line cell is styled on its own by the formatters
    const style = actionStyle(action, colorEnabled)
    const sortedAddresses = [...addresses].sort()
    rows.push({ cells: [cell(action, style), cell(sortedAddresses.join('\n'), style)] })
  }

  return {
    title: CHANGES_TITLE,
    columns: [{ header: 'Action' }, { header: 'Addresses' }],
    rows,
  }
}
