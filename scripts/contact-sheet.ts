#!/usr/bin/env tsx
/**
 * Contact sheet CLI
 * Usage: npm run contact-sheet -- <input_dir> [options]
 */
import { Effect, Fiber } from 'effect'
import { describeExit, runCli } from '../src/cli/contact-sheet-cli'
import { getLogger } from '../src/infrastructure/logging/logger'
import { ContactSheetLive } from '../src/services/contact-sheet'

const logger = getLogger().withContext({ service: 'contact-sheet-cli' })

async function main(): Promise<number> {
  const fiber = Effect.runFork(runCli(process.argv.slice(2), ContactSheetLive))

  // Ctrl+C: fiber を中断し、書きかけの PDF は DocumentService 側で破棄される
  const interrupt = (signal: NodeJS.Signals) => {
    logger.debug('interrupt_requested', { signal })
    Effect.runFork(Fiber.interrupt(fiber))
  }
  process.once('SIGINT', interrupt)
  process.once('SIGTERM', interrupt)

  const exit = await Effect.runPromise(Fiber.await(fiber))
  process.off('SIGINT', interrupt)
  process.off('SIGTERM', interrupt)

  const outcome = describeExit(exit)
  if (outcome.stdout) console.log(outcome.stdout)
  if (outcome.stderr) console.error(outcome.stderr)
  return outcome.exitCode
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    logger.error('contact_sheet_cli_crashed', {
      error: error instanceof Error ? error.message : String(error),
    })
    process.exitCode = 1
  })
