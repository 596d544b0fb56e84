/**
 * normalize: print the text the classifier would see for a raw ticket body.
 */

import {
  type ExtractionPath,
  type TicketType,
  extractMessage,
  inferTypeFromSubject,
  isAlarmTicket,
} from '@desk-triage/core'
import type { Command } from 'commander'
import { buildContext, handleCommandError } from '../core/command'
import type { CommandContext } from '../core/context'
import { readInput } from '../core/input'

export interface NormalizeReport {
  cleanText: string
  extractionPath: ExtractionPath
  ticketType: TicketType
  isAlarm: boolean
}

export async function runNormalizeCommand(
  ctx: CommandContext,
  opts: { file?: string; subject: string }
): Promise<NormalizeReport | null> {
  try {
    const body = await readInput(ctx, opts.file)
    const { cleanText, extractionPath } = extractMessage(opts.subject, body)
    const report: NormalizeReport = {
      cleanText,
      extractionPath,
      ticketType: inferTypeFromSubject(opts.subject),
      isAlarm: isAlarmTicket(`${opts.subject}\n\n${cleanText}`, {
        senderFingerprint: ctx.loadConfig().alarmSenderFingerprint,
      }),
    }

    if (ctx.format === 'json') {
      ctx.output.data(report)
    } else {
      ctx.output.data(cleanText)
      ctx.output.message(
        `path=${extractionPath} type=${report.ticketType} alarm=${report.isAlarm}`
      )
    }
    return report
  } catch (error) {
    handleCommandError(ctx, error, 'Failed to normalize ticket body.')
    return null
  }
}

export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize')
    .description('Extract the readable message from a raw ticket body')
    .argument('[file]', 'File with the raw body (default: stdin)')
    .option('-s, --subject <subject>', 'Ticket subject', '')
    .action(
      async (
        file: string | undefined,
        options: { subject: string },
        command: Command
      ) => {
        const ctx = buildContext(command)
        await runNormalizeCommand(ctx, { file, subject: options.subject })
      }
    )
}
