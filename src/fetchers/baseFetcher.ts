import { EventEmitter } from 'events'
import {
   CommandRunner,
   FetchOutcome,
   FetcherConfig,
   FetcherDependencies,
   RateLimitedEvent,
   SleepFn,
} from './types'
import { isRateLimited } from './rateLimit'
import { IMetadataStore, createMetadataStore } from '../store'
import execaWrapper from '../utils/execaWrapper'
import { sleep } from '../utils/sleep'

// BaseFetcher extends EventEmitter so callers can follow the retry loop.
// Implementations emit 'rateLimited' with a RateLimitedEvent before each wait.
export abstract class BaseFetcher extends EventEmitter {
   protected config: FetcherConfig
   protected running = false
   protected runner: CommandRunner
   protected sleep: SleepFn
   protected store: IMetadataStore
   protected isRateLimited: (output: string) => boolean
   private abortController = new AbortController()

   constructor(config: FetcherConfig, deps: FetcherDependencies = {}) {
      super()
      this.config = config
      this.runner = deps.runner ?? execaWrapper.run
      this.sleep = deps.sleep ?? sleep
      this.store = deps.store ?? createMetadataStore(config.outputDir)
      this.isRateLimited = deps.isRateLimited ?? isRateLimited
   }

   abstract fetchOne(imageTag: string): Promise<FetchOutcome>

   async prepare(): Promise<void> {
      await this.store.prepare()
   }

   /**
    * Fetches every tag in order, one at a time. Stops early only when
    * stop() is called; per-tag failures never end the loop.
    */
   async fetchAll(imageTags: string[]): Promise<FetchOutcome[]> {
      if (this.abortController.signal.aborted) {
         this.abortController = new AbortController()
      }
      this.running = true
      const outcomes: FetchOutcome[] = []
      try {
         for (const tag of imageTags) {
            if (!this.running) break
            const outcome = await this.fetchOne(tag)
            outcomes.push(outcome)
            if (outcome.status === 'aborted') break
         }
      } finally {
         this.running = false
      }
      return outcomes
   }

   async stop(): Promise<void> {
      this.running = false
      this.abortController.abort()
   }

   isRunning() {
      return this.running
   }

   onRateLimited(listener: (event: RateLimitedEvent) => void): this {
      return this.on('rateLimited', listener)
   }

   protected emitRateLimited(event: RateLimitedEvent) {
      this.emit('rateLimited', event)
   }

   protected get signal(): AbortSignal {
      return this.abortController.signal
   }
}
