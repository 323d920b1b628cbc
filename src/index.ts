#!/usr/bin/env node
import path from 'path'
import { loadConfig, MetadataFetchConfig } from './config'
import { loadImageTags } from './export/loader'
import { fetcherRegistry } from './fetchers/registry'
import { FetcherDependencies } from './fetchers/types'
import { ExportFileNotFoundError } from './errors'

// exit status of a run interrupted with Ctrl-C
const INTERRUPTED_EXIT_CODE = 130

/**
 * Fetches metadata for every image tag in the export file and returns the
 * process exit code. Per-artifact failures are reported on the console and in
 * the metadata files; only a missing export file makes the run fail.
 */
export async function main(
   config: MetadataFetchConfig = loadConfig(),
   deps: FetcherDependencies = {}
): Promise<number> {
   let imageTags: string[]
   try {
      imageTags = loadImageTags(path.resolve(config.exportFile))
   } catch (err) {
      if (!(err instanceof ExportFileNotFoundError)) throw err
      const name = path.basename(config.exportFile)
      console.error(
         `${name} not found! Please place ${name} in the current directory.`
      )
      return 1
   }

   const fetcher = fetcherRegistry[config.fetcherType](config, deps)
   await fetcher.prepare()

   console.log(`Fetching metadata for ${imageTags.length} artifacts`)
   console.log(`  cli: ${config.program}`)
   console.log(`  output: ${config.outputDir}`)
   console.log(
      `  maxRetries=${config.maxRetries} retryDelaySeconds=${config.retryDelaySeconds}`
   )

   fetcher.onRateLimited((event) => {
      console.log(
         `${event.imageTag}: waiting until ${event.nextAttemptAt.toLocaleString()} to retry`
      )
   })

   // Graceful shutdown: interrupt a pending retry wait and stop the loop
   let interrupted = false
   const onSigint = () => {
      console.log('Shutting down...')
      interrupted = true
      fetcher.stop().catch((err) => console.error('Failed to stop fetcher', err))
   }
   process.once('SIGINT', onSigint)

   try {
      const outcomes = await fetcher.fetchAll(imageTags)
      if (outcomes.length < imageTags.length) interrupted = true
   } finally {
      process.removeListener('SIGINT', onSigint)
   }

   if (interrupted) {
      console.warn('Interrupted; remaining artifacts were not fetched.')
      return INTERRUPTED_EXIT_CODE
   }
   console.log(
      `All metadata fetched and stored in the '${config.outputDir}' directory.`
   )
   return 0
}

if (require.main === module) {
   main()
      .then((code) => {
         process.exitCode = code
      })
      .catch((err) => {
         console.error('Fatal error', err)
         process.exit(1)
      })
}
