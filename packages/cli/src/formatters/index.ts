import { CLITableFormatter } from './cli-table-formatter.js'
import { MarkdownFormatter } from './markdown-formatter.js'
import type { IFormatter } from './formatter.js'
import { UserError } from '../utils/index.js'

export type { IFormatter, FormatOptions } from './formatter.js'
export { CLITableFormatter, MarkdownFormatter }

export const formatters: readonly IFormatter[] = [CLITableFormatter, MarkdownFormatter]

export function getFormatter(name?: string): IFormatter {
  if (!name) {
    return CLITableFormatter
  }
  const formatter = formatters.find((f) => f.name === name)
  if (!formatter) {
    throw new UserError(`Formatter ${name} not found. Available formatters: ${formatters.map((f) => f.name).join(', ')}`)
  }
  return formatter
}
