import type { IFormatter } from './formatter.js'
import type { TableCell, TableColumn, TableDocument } from '../reports/index.js'

/**
 * GitHub-flavoured markdown, meant for pull request comments. Colors have no
 * markdown equivalent and are dropped; bold is kept.
 */
export const MarkdownFormatter: IFormatter = {
  name: 'markdown',

  format(table: TableDocument): string {
    const lines = [
      `### ${table.title}`,
      '',
      markdownRow(table.columns.map((c) => escapeCell(c.header))),
      markdownRow(table.columns.map(alignmentMarker)),
      ...table.rows.map((row) => markdownRow(table.columns.map((_, index) => cellToMarkdown(row.cells[index])))),
    ]
    return lines.join('\n')
  },
}

function markdownRow(values: string[]): string {
  return `| ${values.join(' | ')} |`
}

function alignmentMarker(column: TableColumn): string {
  return column.align === 'right' ? '---:' : '---'
}

function cellToMarkdown(cell: TableCell | undefined): string {
  if (!cell || cell.text === '') {
    return ''
  }
  const text = cell.text.split('\n').map(escapeCell).join('<br>')
  return cell.style?.bold ? `**${text}**` : text
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|')
}
