import { readFile } from 'fs/promises'
import { planDocumentSchema, formatZodError } from './schemas.js'
import type { PlanDocument } from './schemas.js'
import { PlanFileError } from '../utils/index.js'

const DEFAULT_ENCODING = 'utf-8'

/**
 * Reads a `terraform show -json` document. Any failure aborts with a
 * {@link PlanFileError} naming the path.
 */
export async function loadPlan(filePath: string): Promise<PlanDocument> {
  if (!filePath.toLowerCase().endsWith('.json')) {
    throw new PlanFileError(`File '${filePath}' is not a JSON file`, filePath, 'extension')
  }

  let content: string
  try {
    content = await readFile(filePath, DEFAULT_ENCODING)
  } catch (error) {
    throw new PlanFileError(`Could not read file: ${filePath}`, filePath, 'read', { cause: error })
  }

  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    throw new PlanFileError(`Invalid JSON format in file '${filePath}'`, filePath, 'parse', { cause: error })
  }

  const result = planDocumentSchema.safeParse(json)
  if (!result.success) {
    throw new PlanFileError(
      `Invalid plan structure in file '${filePath}'\n${formatZodError(result.error)}`,
      filePath,
      'schema',
    )
  }
  return result.data
}
