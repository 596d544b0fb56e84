/**
 * triage: run one ticket event through the full dispatcher.
 *
 * --dry-run swaps the helpdesk and the team notifier for recorders, so the
 * model is still asked but nothing is written anywhere.
 */

import {
  type TriageCollaborators,
  type TriageOutcome,
  createDefaultCollaborators,
  createFileDeadLetterQueue,
  runTriage,
  withTracing,
} from '@desk-triage/core'
import type { Command } from 'commander'
import { buildContext, handleCommandError } from '../core/command'
import type { CommandContext } from '../core/context'
import {
  type DryRunAction,
  createRecordingHelpdesk,
  createRecordingNotifier,
} from '../core/dry-run'
import { EXIT_CODES } from '../core/errors'
import { readJsonInput } from '../core/input'

export interface TriageCommandOptions {
  event?: string
  dryRun: boolean
  dlq?: string
  /** Collaborators to use instead of the configured ones */
  collaborators?: Partial<TriageCollaborators>
}

export interface TriageReport extends TriageOutcome {
  dryRunActions?: DryRunAction[]
}

export function exitCodeForStatus(statusCode: number): number {
  if (statusCode >= 500) return EXIT_CODES.error
  if (statusCode === 400) return EXIT_CODES.usage
  return EXIT_CODES.success
}

export async function runTriageCommand(
  ctx: CommandContext,
  opts: TriageCommandOptions
): Promise<TriageReport | null> {
  try {
    const config = ctx.loadConfig()
    const event = await readJsonInput(ctx, opts.event)

    const actions: DryRunAction[] = []
    const overrides: Partial<TriageCollaborators> = opts.dryRun
      ? {
          helpdesk: createRecordingHelpdesk(actions),
          notifier: createRecordingNotifier(actions),
          ...opts.collaborators,
        }
      : { ...opts.collaborators }
    if (opts.dlq && !opts.dryRun) {
      overrides.deadLetters = createFileDeadLetterQueue(opts.dlq)
    }

    const collaborators = createDefaultCollaborators(config, overrides)
    const outcome = await withTracing(
      'cli.triage',
      () =>
        runTriage(event, collaborators, {
          operationsTeam: config.operationsTeam,
          alarmSenderFingerprint: config.alarmSenderFingerprint,
        }),
      { dryRun: opts.dryRun }
    )

    const report: TriageReport = opts.dryRun
      ? { ...outcome, dryRunActions: actions }
      : outcome
    ctx.output.data(report)

    const exitCode = exitCodeForStatus(outcome.statusCode)
    if (exitCode !== EXIT_CODES.success) {
      ctx.output.warn(`Triage answered ${outcome.statusCode}`)
      process.exitCode = exitCode
    }
    return report
  } catch (error) {
    handleCommandError(ctx, error, 'Failed to triage ticket event.')
    return null
  }
}

export function registerTriageCommand(program: Command): void {
  program
    .command('triage')
    .description('Triage a ticket event and dispatch it')
    .argument('[event]', 'JSON file with the ticket event (default: stdin)')
    .option('--dry-run', 'Record helpdesk and team actions instead', false)
    .option('--dlq <path>', 'Park failed events in this JSON-lines file')
    .action(
      async (
        event: string | undefined,
        options: { dryRun: boolean; dlq?: string },
        command: Command
      ) => {
        const ctx = buildContext(command)
        await runTriageCommand(ctx, { event, ...options })
      }
    )
}
