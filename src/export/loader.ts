import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ExportFileNotFoundError, InvalidExportError } from '../errors'

const ExportRecordSchema = z
   .object({
      image_tag: z.union([z.string(), z.number(), z.boolean()]),
   })
   .passthrough()

const ExportSchema = z.array(ExportRecordSchema)

export function loadImageTags(
   file = path.join(process.cwd(), 'Export.json')
): string[] {
   if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new ExportFileNotFoundError(file)
   }
   const raw = fs.readFileSync(file, 'utf8')
   let parsed: unknown
   try {
      parsed = JSON.parse(raw)
   } catch (err) {
      throw new InvalidExportError(
         file,
         err instanceof Error ? err.message : String(err)
      )
   }
   const result = ExportSchema.safeParse(parsed)
   if (!result.success) {
      throw new InvalidExportError(
         file,
         result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')
      )
   }
   return result.data.map((record) => String(record.image_tag))
}
