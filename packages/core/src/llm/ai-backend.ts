/**
 * LlmBackend over the AI SDK
 *
 * Plain text generation with linear-backoff retry. The classifier and the
 * reply generator do their own parsing of whatever text comes back.
 */

import { generateText } from 'ai'
import { DEFAULT_MODEL } from '../config'
import { LlmBackendError } from '../errors'
import { log } from '../observability/axiom'
import type { LlmBackend } from '../pipeline/types'

export type TextGenerator = (request: {
  model: string
  prompt: string
  sessionKey: string
}) => Promise<{ text: string }>

/** Request header that carries the session key to the model provider */
export const SESSION_HEADER = 'X-Session-Key'

export interface AiBackendOptions {
  model?: string
  maxAttempts?: number
  /** Delay before retry n is n × backoffMs */
  backoffMs?: number
  generate?: TextGenerator
  sleep?: (ms: number) => Promise<void>
}

const generateWithAiSdk: TextGenerator = async ({
  model,
  prompt,
  sessionKey,
}) => {
  const result = await generateText({
    model,
    prompt,
    headers: { [SESSION_HEADER]: sessionKey },
  })
  return { text: result.text }
}

const sleepFor = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

export function createAiBackend(options: AiBackendOptions = {}): LlmBackend {
  const model = options.model ?? DEFAULT_MODEL
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3)
  const backoffMs = options.backoffMs ?? 1000
  const generate = options.generate ?? generateWithAiSdk
  const sleep = options.sleep ?? sleepFor

  return {
    async invoke(sessionKey, prompt) {
      let lastError: unknown

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          const { text } = await generate({ model, prompt, sessionKey })
          return text
        } catch (error) {
          lastError = error
          await log('warn', 'LLM call failed', {
            workflow: 'triage',
            step: 'llm',
            sessionKey,
            model,
            attempt,
            error: error instanceof Error ? error.message : String(error),
          })
          if (attempt < maxAttempts) {
            await sleep(attempt * backoffMs)
          }
        }
      }

      throw new LlmBackendError(maxAttempts, {
        message: `LLM call failed after ${maxAttempts} attempts`,
        details: { sessionKey, model },
        cause: lastError,
      })
    },
  }
}
