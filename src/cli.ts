/**
 * period-resolver executable
 */

import { loadDotenv } from './config'
import { runCli } from './program'

loadDotenv()

runCli(process.argv).then(
  (code) => {
    process.exitCode = code
  },
  (e: unknown) => {
    console.error(e)
    process.exitCode = 1
  },
)
