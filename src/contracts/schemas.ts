import { z } from 'zod'

const CountSchema = z.number().int().nonnegative()

export const RecordedFileSchema = z.object({
  lineCount: CountSchema,
  charCount: CountSchema,
  hash: z.string(),
})

export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  projectPath: z.string().min(1),
  startTime: z.string().datetime({ offset: true }),
  initialLineCount: CountSchema,
  initialCharCount: CountSchema.default(0),
  files: z.record(RecordedFileSchema).default({}),
})

// Config file schema; stateDir falls back to the platform data directory
export const EgoConfigFileSchema = z.object({
  stateDir: z.string().min(1).optional(),
  scan: z.object({
    includeHidden: z.boolean().default(true),
    concurrency: z.number().int().min(1).max(256).default(8),
  }).default({
    includeHidden: true,
    concurrency: 8,
  }),
})
