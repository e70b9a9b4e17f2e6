import type { ChalkInstance } from 'chalk'
import type { TableDocument } from '../reports/index.js'

export interface FormatOptions {
  /**
   * Chalk instance used for styled cells. Defaults to the shared instance, which
   * follows the terminal's color support.
   */
  chalk?: ChalkInstance
}

export interface IFormatter {
  readonly name: string
  format(table: TableDocument, options?: FormatOptions): string
}
