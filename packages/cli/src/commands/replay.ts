/**
 * replay: re-run the events parked in a dead-letter file.
 */

import {
  type ReplaySummary,
  type TriageCollaborators,
  createDefaultCollaborators,
  createFileDeadLetterQueue,
  replayDeadLetters,
  runTriage,
} from '@desk-triage/core'
import type { Command } from 'commander'
import { buildContext, handleCommandError } from '../core/command'
import type { CommandContext } from '../core/context'
import { EXIT_CODES, UsageError } from '../core/errors'

export interface ReplayCommandOptions {
  file: string
  batchSize: number
  collaborators?: Partial<TriageCollaborators>
}

export async function runReplayCommand(
  ctx: CommandContext,
  opts: ReplayCommandOptions
): Promise<ReplaySummary | null> {
  try {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new UsageError({
        userMessage: `Invalid batch size: ${opts.batchSize}`,
        suggestion: 'Use a positive integer.',
      })
    }

    const config = ctx.loadConfig()
    const queue = createFileDeadLetterQueue(opts.file)
    // Failures stay in the file being replayed; never park them twice.
    const collaborators = createDefaultCollaborators(config, {
      ...opts.collaborators,
      deadLetters: undefined,
    })

    ctx.output.progress(`Replaying ${opts.file}...`)
    const summary = await replayDeadLetters(
      queue,
      (event) =>
        runTriage(event, collaborators, {
          operationsTeam: config.operationsTeam,
          alarmSenderFingerprint: config.alarmSenderFingerprint,
        }),
      { batchSize: opts.batchSize }
    )

    ctx.output.data(summary)
    if (summary.kept > 0) {
      ctx.output.warn(`${summary.kept} event(s) still failing`)
      process.exitCode = EXIT_CODES.error
    } else {
      ctx.output.success(`Replayed ${summary.replayed} event(s)`)
    }
    return summary
  } catch (error) {
    handleCommandError(ctx, error, 'Failed to replay dead letters.')
    return null
  }
}

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Re-run ticket events parked in a dead-letter file')
    .argument('<file>', 'Dead-letter JSON-lines file')
    .option(
      '--batch-size <n>',
      'Events read per batch',
      (value: string) => Number.parseInt(value, 10),
      10
    )
    .action(
      async (file: string, options: { batchSize: number }, command: Command) => {
        const ctx = buildContext(command)
        await runReplayCommand(ctx, { file, batchSize: options.batchSize })
      }
    )
}
