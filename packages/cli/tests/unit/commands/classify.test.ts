import { afterEach, describe, expect, it, vi } from 'vitest'
import { runClassifyCommand } from '../../../src/commands/classify'
import { createTestContext } from '../../helpers/test-context'

const BODY = 'Hello team,\nOur monthly bill looks expensive.\nThanks'

describe('classify command', () => {
  afterEach(() => {
    process.exitCode = undefined
  })

  it('uses the keyword rules offline', async () => {
    const llm = { invoke: vi.fn() }
    const { ctx, getStdout } = createTestContext({ input: BODY })

    await runClassifyCommand(ctx, {
      subject: 'Billing question',
      ticketId: 'cli',
      offline: true,
      llm,
    })

    expect(JSON.parse(getStdout())).toEqual({
      category: 'cost_optimization',
      confidence: 0.7,
      source: 'keyword-fallback',
    })
    expect(llm.invoke).not.toHaveBeenCalled()
  })

  it('asks the model with subject and clean text', async () => {
    const llm = {
      invoke: vi
        .fn()
        .mockResolvedValue('{"category": "security", "confidence": 0.82}'),
    }
    const { ctx, getStdout } = createTestContext({
      input: BODY,
      format: 'text',
    })

    const result = await runClassifyCommand(ctx, {
      subject: 'Billing question',
      ticketId: 'T-1',
      offline: false,
      llm,
    })

    expect(result).toEqual({
      category: 'security',
      confidence: 0.82,
      source: 'llm',
    })
    expect(getStdout()).toBe('security (0.82, llm)\n')
    expect(llm.invoke).toHaveBeenCalledWith(
      'T-1',
      expect.stringContaining(
        '"Billing question\n\nHello team,\nOur monthly bill looks expensive."'
      )
    )
  })

  it('falls back to keywords when the model fails', async () => {
    const llm = { invoke: vi.fn().mockRejectedValue(new Error('timeout')) }
    const { ctx } = createTestContext({ input: BODY })

    const result = await runClassifyCommand(ctx, {
      subject: 'Billing question',
      ticketId: 'T-2',
      offline: false,
      llm,
    })

    expect(result?.source).toBe('keyword-fallback')
    expect(process.exitCode).toBeUndefined()
  })
})
