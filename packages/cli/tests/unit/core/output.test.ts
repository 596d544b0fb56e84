import { Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import {
  JsonFormatter,
  TextFormatter,
  createOutputFormatter,
  resolveOutputFormat,
} from '../../../src/core/output'

const createCapture = () => {
  let output = ''
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      output += chunk.toString()
      callback()
    },
  })
  return { stream, read: () => output }
}

describe('OutputFormatter', () => {
  it('writes JSON data to stdout', () => {
    const stdout = createCapture()
    const stderr = createCapture()
    const formatter = new JsonFormatter({
      stdout: stdout.stream,
      stderr: stderr.stream,
    })

    formatter.data({ ok: true })

    expect(stdout.read()).toBe('{"ok":true}\n')
    expect(stderr.read()).toBe('')
  })

  it('writes JSON status lines to stderr', () => {
    const stdout = createCapture()
    const stderr = createCapture()
    const formatter = new JsonFormatter({
      stdout: stdout.stream,
      stderr: stderr.stream,
    })

    formatter.warn('careful')
    formatter.error('broken')

    expect(stderr.read()).toBe(
      '{"level":"warn","message":"careful"}\n' +
        '{"level":"error","message":"broken"}\n'
    )
    expect(stdout.read()).toBe('')
  })

  it('writes plain strings as-is in text mode', () => {
    const stdout = createCapture()
    const stderr = createCapture()
    const formatter = new TextFormatter({
      stdout: stdout.stream,
      stderr: stderr.stream,
    })

    formatter.data('Server unreachable')
    formatter.success('done')

    expect(stdout.read()).toBe('Server unreachable\n')
    expect(stderr.read()).toBe('SUCCESS: done\n')
  })

  it('silences messages but not errors when quiet', () => {
    const stdout = createCapture()
    const stderr = createCapture()
    const formatter = new TextFormatter({
      stdout: stdout.stream,
      stderr: stderr.stream,
      quiet: true,
    })

    formatter.message('hello')
    formatter.warn('careful')
    formatter.error('broken')

    expect(stderr.read()).toBe('ERROR: broken\n')
  })

  it('only writes progress when verbose', () => {
    const stderr = createCapture()
    const quietFormatter = new TextFormatter({
      stdout: createCapture().stream,
      stderr: stderr.stream,
    })
    quietFormatter.progress('working')
    expect(stderr.read()).toBe('')

    const verboseFormatter = new TextFormatter({
      stdout: createCapture().stream,
      stderr: stderr.stream,
      verbose: true,
    })
    verboseFormatter.progress('working')
    expect(stderr.read()).toBe('working\n')
  })
})

describe('resolveOutputFormat', () => {
  it('prefers an explicit format', () => {
    expect(resolveOutputFormat('text', createCapture().stream)).toBe('text')
  })

  it('uses text on a terminal and JSON otherwise', () => {
    const tty = Object.assign(createCapture().stream, { isTTY: true })
    const pipe = createCapture().stream

    expect(resolveOutputFormat(undefined, tty)).toBe('text')
    expect(resolveOutputFormat(undefined, pipe)).toBe('json')
  })

  it('builds the matching formatter', () => {
    const formatter = createOutputFormatter({
      format: 'text',
      stdout: createCapture().stream,
      stderr: createCapture().stream,
    })

    expect(formatter).toBeInstanceOf(TextFormatter)
  })
})
