import { BaseFetcher } from './baseFetcher'
import { FetchOutcome } from './types'
import { FetchAbortedError, UnsafeImageTagError } from '../errors'

export class BugswarmCliFetcher extends BaseFetcher {
   async fetchOne(imageTag: string): Promise<FetchOutcome> {
      // eslint-disable-next-line no-console
      console.log(`Fetching metadata for artifact: ${imageTag}`)

      let outputPath: string
      try {
         outputPath = this.store.pathFor(imageTag)
      } catch (err) {
         if (!(err instanceof UnsafeImageTagError)) throw err
         // eslint-disable-next-line no-console
         console.error(`[ERROR] ${err.message}. Skipping this artifact.`)
         return {
            imageTag,
            status: 'failed',
            attempts: 0,
            exitCode: null,
            outputPath: null,
         }
      }

      const args = ['show', '--image-tag', imageTag]
      const delayMs = this.config.retryDelaySeconds * 1000
      let attempt = 1
      let lastExitCode: number | null = null

      while (true) {
         if (this.signal.aborted) {
            return {
               imageTag,
               status: 'aborted',
               attempts: attempt - 1,
               exitCode: lastExitCode,
               outputPath,
            }
         }

         // eslint-disable-next-line no-console
         console.log(`Attempt ${attempt} for ${imageTag}`)
         const result = await this.runner(this.config.program, args)
         lastExitCode = result.exitCode
         // keep the output even when it is an error message
         try {
            await this.store.write(imageTag, result.output)
         } catch (err) {
            // eslint-disable-next-line no-console
            console.error(
               `[ERROR] Could not write metadata for ${imageTag}: ${
                  err instanceof Error ? err.message : String(err)
               }`
            )
            return {
               imageTag,
               status: 'failed',
               attempts: attempt,
               exitCode: result.exitCode,
               outputPath: null,
            }
         }

         if (!this.isRateLimited(result.output)) {
            if (result.exitCode === 0) {
               // eslint-disable-next-line no-console
               console.log(`Successfully fetched metadata for ${imageTag}.`)
            } else {
               // eslint-disable-next-line no-console
               console.error(
                  `[ERROR] An error occurred while fetching metadata for ${imageTag}.`
               )
            }
            return {
               imageTag,
               status: result.exitCode === 0 ? 'success' : 'failed',
               attempts: attempt,
               exitCode: result.exitCode,
               outputPath,
            }
         }

         attempt += 1
         if (attempt > this.config.maxRetries) {
            // eslint-disable-next-line no-console
            console.error(
               `[ERROR] Max retries reached for ${imageTag}. Skipping this artifact.`
            )
            return {
               imageTag,
               status: 'skipped',
               attempts: attempt - 1,
               exitCode: lastExitCode,
               outputPath,
            }
         }

         // eslint-disable-next-line no-console
         console.warn(
            `[WARN] Rate limit encountered for ${imageTag}. Waiting ${this.config.retryDelaySeconds} seconds before retrying.`
         )
         this.emitRateLimited({
            imageTag,
            attempt: attempt - 1,
            delayMs,
            nextAttemptAt: new Date(Date.now() + delayMs),
         })
         try {
            await this.sleep(delayMs, this.signal)
         } catch (err) {
            if (!(err instanceof FetchAbortedError)) throw err
            return {
               imageTag,
               status: 'aborted',
               attempts: attempt - 1,
               exitCode: lastExitCode,
               outputPath,
            }
         }
      }
   }
}
