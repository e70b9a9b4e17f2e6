import { z } from 'zod'
import type { ZodError } from 'zod'

export const UNKNOWN_ADDRESS = 'unknown_address'

// Only the fields the summary reads are checked; everything else passes through.
export const resourceChangeSchema = z
  .object({
    address: z.string().optional(),
    // any falsy change (null, false, 0, '') means no actions
    change: z.preprocess(
      (value) => value || undefined,
      z
        .object({
          actions: z
            .array(z.string())
            .optional()
            .nullable()
            .transform((v) => v ?? undefined),
        })
        .passthrough()
        .optional(),
    ),
  })
  .passthrough()

export const planDocumentSchema = z
  .object({
    resource_changes: z
      .array(resourceChangeSchema)
      .optional()
      .nullable()
      .transform((v) => v ?? []),
  })
  .passthrough()

export const REPORT_NAMES = ['statistics', 'resources'] as const
export const FORMAT_NAMES = ['table', 'markdown'] as const

export const summaryConfigSchema = z
  .object({
    color: z.boolean().optional(),
    format: z.enum(FORMAT_NAMES).optional(),
    reports: z.array(z.enum(REPORT_NAMES)).optional(),
  })
  .strict()

export type PlanDocument = z.output<typeof planDocumentSchema>
export type SummaryConfig = z.output<typeof summaryConfigSchema>
export type ReportName = (typeof REPORT_NAMES)[number]
export type FormatName = (typeof FORMAT_NAMES)[number]

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    .join('\n')
}
