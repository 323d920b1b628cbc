import { MetadataFetchConfig } from '../config'
import { IMetadataStore } from '../store'
import { RunResult } from '../utils/execaWrapper'

export type FetcherConfig = Pick<
   MetadataFetchConfig,
   'program' | 'outputDir' | 'maxRetries' | 'retryDelaySeconds'
>

export type FetchStatus = 'success' | 'failed' | 'skipped' | 'aborted'

export interface FetchOutcome {
   imageTag: string
   status: FetchStatus
   // number of times the CLI was invoked for this tag
   attempts: number
   // exit code of the last invocation, null when the CLI never ran
   exitCode: number | null
   outputPath: string | null
}

export interface RateLimitedEvent {
   imageTag: string
   // the attempt that hit the rate limit
   attempt: number
   delayMs: number
   nextAttemptAt: Date
}

export type CommandRunner = (
   program: string,
   args: string[]
) => Promise<RunResult>

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

// Everything a fetcher talks to, injectable for tests.
export interface FetcherDependencies {
   runner?: CommandRunner
   sleep?: SleepFn
   store?: IMetadataStore
   isRateLimited?: (output: string) => boolean
}
