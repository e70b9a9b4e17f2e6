import { Command } from 'commander'
import { dirname, join } from 'path'
import { readFile } from 'fs/promises'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { readConfig, resolveOptions } from './core/config.js'
import type { CliOptions } from './core/config.js'
import { runSummary } from './core/summary-command.js'
import { formatters } from './formatters/index.js'
import { formatUnexpectedError, logger, UserError } from './utils/index.js'

const packageJsonSchema = z.object({ version: z.string() })

export async function getPackageJsonVersion(): Promise<string> {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  const packageJsonPath = join(__dirname, '../package.json')

  const packageJson = packageJsonSchema.parse(JSON.parse(await readFile(packageJsonPath, 'utf-8')))
  return packageJson.version
}

interface ProgramOptions extends CliOptions {
  verbose?: boolean
  quiet?: boolean
}

export function createProgram(version: string, cwd: string = process.cwd()): Command {
  const program = new Command()

  program
    .name('tfplan-summary')
    .description('Summarize a Terraform plan JSON file by action')
    .version(version)
    .requiredOption('-p, --path <path>', 'Path to the Terraform plan JSON file (terraform show -json)')
    .option('-c, --color', 'Display output with colors')
    .option(
      '-s, --statistics',
      'Display the statistics table (if neither -s nor -r is specified, both are shown)',
    )
    .option(
      '-r, --resources',
      'Display the resource changes table (if neither -s nor -r is specified, both are shown)',
    )
    .option('-f, --format <format>', `Output format (${formatters.map((f) => f.name).join(', ')})`)
    .option('--config <config>', 'Path to a tfplan-summary.yml config file')
    .option('--verbose', 'Show verbose output')
    .option('-q, --quiet', 'Show quiet output')
    .action(async ({ verbose, quiet, ...cli }: ProgramOptions) => {
      if (verbose) {
        logger.setVerbose()
      }
      if (quiet) {
        logger.setQuiet()
      }

      const config = await readConfig(cwd, cli.config)
      const options = resolveOptions(cli, config)
      logger.debug(`Options: ${JSON.stringify(options)}`)

      await runSummary(options)
    })

  return program
}

/**
 * Reports an error that ends the run and returns the exit code. Returns
 * `undefined` when the error should be rethrown for its stack trace.
 */
export function reportFatalError(err: Error, version: string): number | undefined {
  if (err instanceof UserError) {
    logger.fatal(`ERROR: ${err.message}`)
    return err.exitCode
  }

  if (!logger.isVerbose()) {
    logger.fatal(formatUnexpectedError(err, version))
    return 1
  }

  return undefined
}
