import path from 'path'
import { z } from 'zod'
import { InvalidConfigError } from './errors'

export const FETCHER_TYPES = ['bugswarm-cli'] as const

const ConfigSchema = z.object({
   fetcherType: z.enum(FETCHER_TYPES).default('bugswarm-cli'),
   // binary of the dataset CLI, e.g. 'bugswarm' or a full path
   program: z.string().min(1).default('bugswarm'),
   exportFile: z.string().min(1).default('Export.json'),
   outputDir: z.string().min(1).default(path.join('Data', 'metadata')),
   maxRetries: z.coerce.number().int().positive().default(5),
   retryDelaySeconds: z.coerce.number().nonnegative().default(60),
})

export type MetadataFetchConfig = z.infer<typeof ConfigSchema>

function unset(value: string | undefined): string | undefined {
   if (value === undefined || value.trim() === '') return undefined
   return value
}

export function loadConfig(
   env: NodeJS.ProcessEnv = process.env
): MetadataFetchConfig {
   const result = ConfigSchema.safeParse({
      fetcherType: unset(env.METADATA_FETCHER),
      program: unset(env.BUGSWARM_CLI),
      exportFile: unset(env.EXPORT_FILE),
      outputDir: unset(env.METADATA_OUTPUT_DIR),
      maxRetries: unset(env.MAX_RETRIES),
      retryDelaySeconds: unset(env.RETRY_DELAY_SECONDS),
   })
   if (!result.success) {
      throw new InvalidConfigError(
         result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')
      )
   }
   return result.data
}
