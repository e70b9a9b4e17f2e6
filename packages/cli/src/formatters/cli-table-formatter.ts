import chalk from 'chalk'
import stringWidth from 'string-width'
import type { ChalkInstance } from 'chalk'
import type { FormatOptions, IFormatter } from './formatter.js'
import type { CellStyle, TableColumn, TableDocument, TableRow } from '../reports/index.js'

const BORDERS = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
} as const

type BorderKind = keyof typeof BORDERS

/**
 * Renders a table with box-drawing borders for the console. Widths are the
 * display widths of the unstyled text, so colors and wide characters keep the
 * borders aligned.
 */
export const CLITableFormatter: IFormatter = {
  name: 'table',

  format(table: TableDocument, options: FormatOptions = {}): string {
    const painter = options.chalk ?? chalk
    const widths = getColumnWidths(table.columns, table.rows)

    const lines: string[] = []
    const top = border('top', widths)
    lines.push(centerTitle(table.title, stringWidth(top)))
    lines.push(top)
    lines.push(
      contentLine(
        table.columns.map((c) => c.header),
        table.columns,
        widths,
        [],
        painter,
      ),
    )
    lines.push(border('middle', widths))

    for (const row of table.rows) {
      if (row.section) {
        lines.push(border('middle', widths))
      }
      lines.push(...rowLines(row, table.columns, widths, painter))
    }

    lines.push(border('bottom', widths))
    return lines.join('\n')
  },
}

function getColumnWidths(columns: readonly TableColumn[], rows: readonly TableRow[]): number[] {
  const widths = columns.map((c) => stringWidth(c.header))

  for (const row of rows) {
    row.cells.forEach((cell, index) => {
      for (const line of cell.text.split('\n')) {
        widths[index] = Math.max(widths[index] ?? 0, stringWidth(line))
      }
    })
  }

  return widths
}

function border(kind: BorderKind, widths: number[]): string {
  const [left, join, right] = BORDERS[kind]
  return `${left}${widths.map((w) => '─'.repeat(w + 2)).join(join)}${right}`
}

function centerTitle(title: string, width: number): string {
  const padding = Math.max(0, Math.floor((width - stringWidth(title)) / 2))
  return `${' '.repeat(padding)}${title}`
}

function rowLines(
  row: TableRow,
  columns: readonly TableColumn[],
  widths: number[],
  painter: ChalkInstance,
): string[] {
  const cellLines = columns.map((_, index) => row.cells[index]?.text.split('\n') ?? [''])
  const height = Math.max(1, ...cellLines.map((l) => l.length))
  const styles = columns.map((_, index) => row.cells[index]?.style)

  const lines: string[] = []
  for (let i = 0; i < height; i++) {
    lines.push(
      contentLine(
        cellLines.map((l) => l[i] ?? ''),
        columns,
        widths,
        styles,
        painter,
      ),
    )
  }
  return lines
}

function contentLine(
  values: string[],
  columns: readonly TableColumn[],
  widths: number[],
  styles: ReadonlyArray<CellStyle | undefined>,
  painter: ChalkInstance,
): string {
  const cells = values.map((value, index) => {
    const valueWidth = stringWidth(value)
    const width = widths[index] ?? valueWidth
    const padding = ' '.repeat(Math.max(0, width - valueWidth))
    const text = paint(value, styles[index], painter)
    return columns[index]?.align === 'right' ? `${padding}${text}` : `${text}${padding}`
  })
  return `│ ${cells.join(' │ ')} │`
}

function paint(value: string, style: CellStyle | undefined, painter: ChalkInstance): string {
  if (!style || value === '') {
    return value
  }
  const colored = painter.hex(style.color)
  return style.bold ? colored.bold(value) : colored(value)
}
