import chalk from 'chalk'
import type { ChalkInstance } from 'chalk'
import { aggregateChanges } from './change-aggregator.js'
import type { Summary } from './change-aggregator.js'
import type { SummaryOptions } from './config.js'
import { loadPlan } from './plan-loader.js'
import { getFormatter } from '../formatters/index.js'
import type { IFormatter } from '../formatters/index.js'
import { buildChanges, buildStatistics, DEFAULT_COLOR } from '../reports/index.js'
import { logger } from '../utils/index.js'

export const NO_CHANGES_MESSAGE = 'Your infrastructure matches the configuration.'

export interface OutputWriter {
  write(chunk: string): unknown
}

export interface RenderOptions {
  color: boolean
  showStatistics: boolean
  showResources: boolean
  chalk?: ChalkInstance
}

export async function runSummary(options: SummaryOptions, out: OutputWriter = process.stdout): Promise<void> {
  const formatter = getFormatter(options.format)
  const plan = await loadPlan(options.path)
  logger.debug(`Read ${plan.resource_changes.length} resource changes from ${options.path}`)

  const summary = aggregateChanges(plan.resource_changes)
  const output = renderReports(summary, formatter, options)
  if (output) {
    out.write(`${output}\n`)
  }
}

/**
 * Resource changes first, then the statistics. When both are shown a blank line
 * leads the output. An empty changes table is not printed; when it was the only
 * report asked for, a "no changes" line replaces it.
 */
export function renderReports(summary: Summary, formatter: IFormatter, options: RenderOptions): string {
  const painter = options.chalk ?? chalk
  const parts: string[] = []

  if (options.showResources) {
    if (options.showStatistics) {
      parts.push('')
    }
    const changes = buildChanges(summary, options.color)
    if (changes.rows.length > 0) {
      parts.push(formatter.format(changes, { chalk: painter }))
    } else if (!options.showStatistics) {
      parts.push(
        options.color
          ? `${painter.green('No changes.')} ${painter.hex(DEFAULT_COLOR)(NO_CHANGES_MESSAGE)}`
          : `No changes. ${NO_CHANGES_MESSAGE}`,
      )
    }
  }

  if (options.showStatistics) {
    parts.push(formatter.format(buildStatistics(summary, options.color), { chalk: painter }))
  }

  return parts.join('\n')
}
