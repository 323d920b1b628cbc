import fs from 'fs'
import os from 'os'
import path from 'path'
import { MetadataFetchConfig, loadConfig } from '../src/config'
import { CommandRunner } from '../src/fetchers/types'
import { RunResult } from '../src/utils/execaWrapper'

export function makeTmpDir(): string {
   return fs.mkdtempSync(path.join(os.tmpdir(), 'artifact-metadata-'))
}

export function makeConfig(
   overrides: Partial<MetadataFetchConfig> = {}
): MetadataFetchConfig {
   return { ...loadConfig({}), ...overrides }
}

// Runner that replays `results` in order, repeating the last one when exhausted.
export function scriptedRunner(results: RunResult[]) {
   let call = 0
   return jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>(
      async () => {
         const result = results[Math.min(call, results.length - 1)]
         call += 1
         return result
      }
   )
}

export function readFile(file: string): string {
   return fs.readFileSync(file, 'utf8')
}

export function silenceConsole() {
   jest.spyOn(console, 'log').mockImplementation(() => undefined)
   jest.spyOn(console, 'warn').mockImplementation(() => undefined)
   jest.spyOn(console, 'error').mockImplementation(() => undefined)
}

// Sleep that returns at once, recording the requested delays.
export function recordingSleep() {
   return jest.fn(async (_ms: number, _signal?: AbortSignal) => undefined)
}
