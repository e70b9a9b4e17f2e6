export type ColumnAlign = 'left' | 'right'

export interface CellStyle {
  /** Hex color, e.g. `#ff0000` */
  readonly color: string
  readonly bold?: boolean
}

export interface TableCell {
  /** May span several lines */
  readonly text: string
  readonly style?: CellStyle | undefined
}

export interface TableRow {
  readonly cells: readonly TableCell[]
  /** Draw a separator above this row */
  readonly section?: boolean
}

export interface TableColumn {
  readonly header: string
  readonly align?: ColumnAlign
}

/**
 * Presentation-neutral table produced by the report builders and rendered by a formatter.
 */
export interface TableDocument {
  readonly title: string
  readonly columns: readonly TableColumn[]
  readonly rows: readonly TableRow[]
}

export function cell(text: string, style?: CellStyle): TableCell {
  return style ? { text, style } : { text }
}
