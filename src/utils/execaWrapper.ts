import execa from 'execa'
import os from 'os'

export interface RunResult {
   // stdout and stderr interleaved as the program wrote them
   output: string
   exitCode: number
}

// what a shell reports for a program it cannot start
const NOT_FOUND_EXIT_CODE = 127
// a shell reports 128 + N for a program killed by signal N
const SIGNAL_EXIT_BASE = 128

const SIGNALS: Record<string, number | undefined> = { ...os.constants.signals }

function signalNumber(signal: string): number {
   return SIGNALS[signal] ?? 0
}

export async function run(program: string, args: string[]): Promise<RunResult> {
   const proc = await execa(program, args, {
      stdio: 'pipe',
      all: true,
      reject: false,
      stripFinalNewline: false,
   })
   if (typeof proc.exitCode === 'number') {
      return { output: proc.all ?? '', exitCode: proc.exitCode }
   }
   // No exit status: the program never started or was killed by a signal.
   if (proc.signal) {
      return {
         output: `${proc.all ?? ''}${program} terminated by ${proc.signal}\n`,
         exitCode: SIGNAL_EXIT_BASE + signalNumber(proc.signal),
      }
   }
   return {
      output: proc.all || `${program}: command not found\n`,
      exitCode: NOT_FOUND_EXIT_CODE,
   }
}

export default { run }
