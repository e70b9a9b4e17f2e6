export class SummaryError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'SummaryError'
  }
}

export class UserError extends SummaryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 2, options)
    this.name = 'UserError'
  }
}

export type PlanFileErrorKind = 'extension' | 'read' | 'parse' | 'schema'

export class PlanFileError extends UserError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly kind: PlanFileErrorKind,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'PlanFileError'
  }
}

export class ConfigError extends UserError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(`${filePath}: ${message}`)
    this.name = 'ConfigError'
  }
}

export const isDebug = () => process.env['TFPLAN_SUMMARY_DEBUG'] === '1'

export function formatUnexpectedError(error: Error, version: string): string {
  return [
    'Unexpected internal error',
    '',
    'Include the following when reporting it:',
    `  tfplan-summary version: ${version}`,
    `  Node.js: ${process.version}`,
    `  OS: ${process.platform} ${process.arch}`,
    '',
    isDebug() ? (error.stack ?? error.message) : error.message,
  ].join('\n')
}
