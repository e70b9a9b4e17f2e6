import { totalResources } from '../core/change-aggregator.js'
import type { Summary } from '../core/change-aggregator.js'
import { actionStyle, DEFAULT_COLOR } from './palette.js'
import { cell } from './table-document.js'
import type { TableDocument, TableRow } from './table-document.js'

export const STATISTICS_TITLE = 'Action Statistics'

/**
 * Number of resources per effective action, in lexicographic action order,
 * closed by a `Total` row when anything was counted.
 */
export function buildStatistics(summary: Summary, colorEnabled = false): TableDocument {
  const rows: TableRow[] = []

  for (const action of [...summary.keys()].sort()) {
    const count = summary.get(action)?.length ?? 0
    if (count === 0) {
      continue
    }

    const style = actionStyle(action, colorEnabled)
    rows.push({ cells: [cell(action, style), cell(String(count), style)] })
  }

  const total = totalResources(summary)
  if (total > 0) {
    const style = colorEnabled ? { color: DEFAULT_COLOR, bold: true } : undefined
    rows.push({ cells: [cell('Total', style), cell(String(total), style)], section: true })
  }

  return {
    title: STATISTICS_TITLE,
    columns: [{ header: 'Action' }, { header: 'Count', align: 'right' }],
    rows,
  }
}
