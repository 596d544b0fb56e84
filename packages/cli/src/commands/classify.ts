/**
 * classify: run the classifier on a raw ticket, or only the keyword rules
 * with --offline.
 */

import {
  type ClassificationResult,
  type LlmBackend,
  classify,
  createAiBackend,
  fallbackClassify,
  normalize,
} from '@desk-triage/core'
import type { Command } from 'commander'
import { buildContext, handleCommandError } from '../core/command'
import type { CommandContext } from '../core/context'
import { readInput } from '../core/input'

export interface ClassifyCommandOptions {
  file?: string
  subject: string
  ticketId: string
  offline: boolean
  /** Backend to use instead of the configured model */
  llm?: LlmBackend
}

export async function runClassifyCommand(
  ctx: CommandContext,
  opts: ClassifyCommandOptions
): Promise<ClassificationResult | null> {
  try {
    const config = ctx.loadConfig()
    const body = await readInput(ctx, opts.file)
    const text = `${opts.subject}\n\n${normalize(opts.subject, body)}`
    const fingerprint = { senderFingerprint: config.alarmSenderFingerprint }

    let result: ClassificationResult
    if (opts.offline) {
      result = fallbackClassify(text, fingerprint)
    } else {
      ctx.output.progress(`Classifying with ${config.model}...`)
      const llm =
        opts.llm ??
        createAiBackend({
          model: config.model,
          maxAttempts: config.llmMaxAttempts,
        })
      result = await classify(opts.ticketId, text, { llm, ...fingerprint })
    }

    if (ctx.format === 'json') {
      ctx.output.data(result)
    } else {
      ctx.output.data(
        `${result.category} (${result.confidence.toFixed(2)}, ${result.source})`
      )
    }
    return result
  } catch (error) {
    handleCommandError(ctx, error, 'Failed to classify ticket.')
    return null
  }
}

export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Classify a raw ticket body into a triage category')
    .argument('[file]', 'File with the raw body (default: stdin)')
    .option('-s, --subject <subject>', 'Ticket subject', '')
    .option('--ticket-id <id>', 'Ticket id used as the session key', 'cli')
    .option('--offline', 'Use the keyword rules only, no model call', false)
    .action(
      async (
        file: string | undefined,
        options: { subject: string; ticketId: string; offline: boolean },
        command: Command
      ) => {
        const ctx = buildContext(command)
        await runClassifyCommand(ctx, { file, ...options })
      }
    )
}
