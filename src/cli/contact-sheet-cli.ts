import { parseArgs } from 'node:util'
import { Cause, ConfigError, Effect, Exit, type Layer, Option } from 'effect'
import { z } from 'zod'
import { cliDefaults } from '@/config/contact-sheet.config'
import { getLogger } from '@/infrastructure/logging/logger'
import { ContactSheetService, formatSummary } from '@/services/contact-sheet'
import type { ContactSheetOptions } from '@/types/contact-sheet'
import { ArgumentError, ContactSheetError } from '@/types/errors/contact-sheet-error'
import { FILL_ORDER_CHOICES, parseFillOrder } from '@/utils/cell-mapper'

export const USAGE = `Usage: contact-sheet <input_dir> [options]

Create contact sheets (PDF) from images in a folder.

Options:
  -o, --output <path>          Output PDF path (default: ${cliDefaults.output})
  --page-orient <o>            A4 page orientation: portrait | landscape (default: ${cliDefaults.pageOrient})
  --uniform-orient <o>         Force thumbnail orientation inside the PDF only:
                               none | portrait | landscape (default: ${cliDefaults.uniformOrient})
  --rows <int>                 Number of rows per page
  --cols <int>                 Number of columns per page
  --margin-mm <mm>             Page margin in millimeters (default: ${cliDefaults.marginMm})
  --gap-mm <mm>                Gap between cells in millimeters (default: ${cliDefaults.gapMm})
  --labels <mode>              Captions under thumbnails: none | index (stem) | name (filename)
                               (default: ${cliDefaults.labels})
  --order <order>              Grid fill order: ${FILL_ORDER_CHOICES.join(' | ')}
                               (default: ${cliDefaults.order})
  -h, --help                   Show this help`

const fillOrderSchema = z.string().transform((raw, ctx) => {
  const order = parseFillOrder(raw)
  if (!order) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid order "${raw}". Expected ${FILL_ORDER_CHOICES.join(' | ')}`,
    })
    return z.NEVER
  }
  return order
})

export const CliOptionsSchema = z.object({
  inputDir: z.string().min(1),
  output: z.string().min(1).default(cliDefaults.output),
  pageOrient: z.enum(['portrait', 'landscape']).default(cliDefaults.pageOrient),
  uniformOrient: z.enum(['none', 'portrait', 'landscape']).default(cliDefaults.uniformOrient),
  rows: z.coerce.number().int().positive().optional(),
  cols: z.coerce.number().int().positive().optional(),
  marginMm: z.coerce.number().finite().nonnegative().default(cliDefaults.marginMm),
  gapMm: z.coerce.number().finite().nonnegative().default(cliDefaults.gapMm),
  labels: z.enum(['none', 'index', 'name']).default(cliDefaults.labels),
  order: fillOrderSchema.default(cliDefaults.order),
})

export type ParsedCli = { readonly help: true } | { readonly help: false; readonly options: ContactSheetOptions }

const optionFlags: Record<string, keyof z.input<typeof CliOptionsSchema>> = {
  output: 'output',
  'page-orient': 'pageOrient',
  'uniform-orient': 'uniformOrient',
  rows: 'rows',
  cols: 'cols',
  'margin-mm': 'marginMm',
  'gap-mm': 'gapMm',
  labels: 'labels',
  order: 'order',
}

function formatIssues(error: z.ZodError): string {
  const flagOf = (key: PropertyKey | undefined) => {
    const flag = Object.keys(optionFlags).find((f) => optionFlags[f] === key)
    return flag ? `--${flag}` : key === 'inputDir' ? 'input_dir' : String(key)
  }
  return error.issues.map((issue) => `${flagOf(issue.path[0])}: ${issue.message}`).join('; ')
}

export function parseCliArgs(argv: readonly string[]): Effect.Effect<ParsedCli, ArgumentError> {
  return Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: () =>
        parseArgs({
          args: [...argv],
          allowPositionals: true,
          strict: true,
          options: {
            output: { type: 'string', short: 'o' },
            'page-orient': { type: 'string' },
            'uniform-orient': { type: 'string' },
            rows: { type: 'string' },
            cols: { type: 'string' },
            'margin-mm': { type: 'string' },
            'gap-mm': { type: 'string' },
            labels: { type: 'string' },
            order: { type: 'string' },
            help: { type: 'boolean', short: 'h' },
          },
        }),
      catch: (cause) =>
        new ArgumentError({
          message: cause instanceof Error ? cause.message : String(cause),
          details: cause,
        }),
    })

    if (parsed.values.help) return { help: true } as const

    if (parsed.positionals.length !== 1) {
      return yield* Effect.fail(
        new ArgumentError({
          message:
            parsed.positionals.length === 0
              ? 'Missing input directory'
              : `Expected one input directory, got ${parsed.positionals.length}`,
        }),
      )
    }

    const raw: Record<string, unknown> = { inputDir: parsed.positionals[0] }
    for (const [flag, value] of Object.entries(parsed.values)) {
      const key = optionFlags[flag]
      if (key && value !== undefined) raw[key] = value
    }

    const result = CliOptionsSchema.safeParse(raw)
    if (!result.success) {
      return yield* Effect.fail(
        new ArgumentError({ message: formatIssues(result.error), details: result.error.issues }),
      )
    }
    return { help: false, options: result.data } as const
  })
}

export interface CliOutcome {
  readonly exitCode: number
  readonly stdout?: string
  readonly stderr?: string
}

export const INTERRUPTED_MESSAGE = 'Interrupted by user.'

/** Exit of a CLI run -> process exit code and user-facing text (no stack traces) */
export function describeExit(exit: Exit.Exit<string, ContactSheetError | ConfigError.ConfigError>): CliOutcome {
  if (Exit.isSuccess(exit)) return { exitCode: 0, stdout: exit.value }
  if (Cause.isInterruptedOnly(exit.cause)) return { exitCode: 130, stderr: INTERRUPTED_MESSAGE }

  const failure = Cause.failureOption(exit.cause)
  if (Option.isSome(failure)) {
    const error = failure.value
    if (ConfigError.isConfigError(error)) {
      return { exitCode: 1, stderr: `Invalid configuration: ${String(error)}` }
    }
    return { exitCode: 1, stderr: ContactSheetError.toMessage(error) }
  }

  getLogger()
    .withContext({ service: 'contact-sheet-cli' })
    .error('unexpected_failure', { cause: Cause.pretty(exit.cause) })
  return { exitCode: 1, stderr: 'Unexpected error; see log for details' }
}

/**
 * Parse argv and build the contact sheet; succeeds with the text to print.
 */
export function runCli<E>(
  argv: readonly string[],
  layer: Layer.Layer<ContactSheetService, E>,
): Effect.Effect<string, ContactSheetError | E> {
  return Effect.gen(function* () {
    const cli = yield* parseCliArgs(argv)
    if (cli.help) return USAGE
    const summary = yield* Effect.flatMap(ContactSheetService, (service) =>
      service.build(cli.options),
    ).pipe(Effect.provide(layer))
    return formatSummary(summary)
  })
}
