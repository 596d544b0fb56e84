/**
 * Reply composition
 *
 * Generates the customer-facing reply through the LLM backend and renders
 * it into the HTML body the helpdesk sends.
 */

import { escapeUTF8 } from 'entities'
import { marked } from 'marked'
import type { LlmBackend, ReplyGenerator, ReplyKind } from '../types'

export const DEFAULT_REPLY = 'Thank you for reaching out.'

// Configure marked for email-safe output.
marked.setOptions({
  gfm: true,
  breaks: true,
})

// ============================================================================
// Reply text extraction
// ============================================================================

/**
 * Pull reply text out of a backend response: `reply`, then `message`, then
 * `raw_response`, or the response itself when it is a string.
 */
export function extractReplyText(response: unknown): string {
  let text = ''

  if (typeof response === 'string') {
    text = response
  } else if (typeof response === 'object' && response !== null) {
    for (const key of ['reply', 'message', 'raw_response']) {
      const value: unknown = Reflect.get(response, key)
      if (typeof value === 'string' && value.trim()) {
        text = value
        break
      }
    }
  }

  return text.trim() ? text.trim() : DEFAULT_REPLY
}

// ============================================================================
// Prompts
// ============================================================================

const REPLY_INSTRUCTIONS: Record<ReplyKind, string> = {
  general: `You are a cloud support engineer writing the first response to a customer ticket.
Acknowledge the request, restate what the customer needs in one sentence, and list the next steps the team will take.
Keep it short and polite. Do not promise timelines.`,

  diagnostic: `You are a cloud support engineer replying to an automated alert or a security or cost notification.
Explain what the notification means, the likely causes, and the checks the team is running now.
Use short markdown sections when there is more than one cause.`,

  remediation: `You are a cloud support engineer reporting an automated change made for the customer.
Summarize what was changed using the automation output below, confirm the current state, and ask the customer to verify.
Do not invent resources that the output does not mention.`,
}

export function buildReplyPrompt(
  kind: ReplyKind,
  ticketId: string,
  details: string
): string {
  return `${REPLY_INSTRUCTIONS[kind]}

Ticket ID: ${ticketId}

${details}

Respond with the reply text only.`
}

/**
 * ReplyGenerator that asks the LLM backend for each reply. Backend errors
 * propagate to the dispatcher.
 */
export function createLlmReplyGenerator(llm: LlmBackend): ReplyGenerator {
  return {
    async generate(kind, ticketId, prompt) {
      const response = await llm.invoke(
        `${ticketId}-${kind}`,
        buildReplyPrompt(kind, ticketId, prompt)
      )
      return extractReplyText(response)
    },
  }
}

// ============================================================================
// Email formatting
// ============================================================================

const MARKDOWN_PATTERN = /#{1,6}\s+|\*\*|__|\[.*?\]\(.*?\)|`{1,3}|^\|/m

export function looksLikeMarkdown(text: string): boolean {
  return MARKDOWN_PATTERN.test(text)
}

export function markdownToHtml(text: string): string {
  return marked.parse(text) as string
}

function wrapInTemplate(body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; padding: 20px; }
    .email-container { background-color: #f9f9f9; border: 1px solid #ddd; padding: 20px; border-radius: 6px; }
    table { width: 100%; border-collapse: collapse; margin-top: 1em; }
    th, td { padding: 8px 12px; border: 1px solid #ccc; text-align: left; }
    th { background-color: #f0f0f0; }
    blockquote { border-left: 4px solid #ccc; margin: 1em 0; padding-left: 1em; color: #555; }
  </style>
</head>
<body>
  <div class="email-container">
${body}
  </div>
</body>
</html>`
}

/**
 * HTML email body for a reply. Markdown is rendered; plain text is escaped
 * with its line breaks kept.
 */
export function formatReplyEmail(text: string): string {
  const body = looksLikeMarkdown(text)
    ? markdownToHtml(text)
    : escapeUTF8(text).replace(/\n/g, '<br>\n')
  return wrapInTemplate(body)
}
