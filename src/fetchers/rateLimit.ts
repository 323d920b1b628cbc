export const RATE_LIMIT_MESSAGE = 'You are being rate limited'

// The dataset CLI signals throttling only through this text; exit codes vary.
export function isRateLimited(output: string): boolean {
   return output.includes(RATE_LIMIT_MESSAGE)
}
