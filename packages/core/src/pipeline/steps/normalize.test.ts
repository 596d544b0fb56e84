import { describe, expect, it } from 'vitest'
import {
  CLOUDWATCH_PREAMBLE,
  EMPTY_BODY_PLACEHOLDER,
  NO_MEANINGFUL_CONTENT_PLACEHOLDER,
  NO_READABLE_TEXT_PLACEHOLDER,
  decodeQuotedPrintable,
  extractJsonBlock,
  extractMessage,
  extractStatusSummary,
  htmlToText,
  normalize,
  stripTransportHeaders,
} from './normalize'

describe('decodeQuotedPrintable', () => {
  it('decodes multi-byte sequences as UTF-8', () => {
    expect(decodeQuotedPrintable('caf=C3=A9')).toBe('café')
  })

  it('joins soft line breaks', () => {
    expect(decodeQuotedPrintable('long=\nline')).toBe('longline')
  })

  it('leaves text that already has non-ASCII characters alone', () => {
    expect(decodeQuotedPrintable('café =41')).toBe('café =41')
  })
})

describe('htmlToText', () => {
  it('drops scripts and styles', () => {
    expect(
      htmlToText('<style>p {}</style><p>Visible</p><script>track()</script>')
    ).toBe('Visible')
  })

  it('decodes entities left over after parsing', () => {
    expect(htmlToText('<p>a &amp;lt; b</p>')).toBe('a < b')
  })
})

describe('stripTransportHeaders', () => {
  it('removes headers and their folded continuation lines', () => {
    const text = 'Received: from mx\n  by relay\nX-Mailer: Foo\nHello there'
    expect(stripTransportHeaders(text)).toBe('Hello there')
  })
})

describe('extractJsonBlock', () => {
  it('skips brace spans that are not JSON', () => {
    expect(extractJsonBlock('use {braces} and {"a": 1}')).toBe(
      '{\n  "a": 1\n}'
    )
  })

  it('returns null when nothing parses', () => {
    expect(extractJsonBlock('no json here {oops')).toBeNull()
  })
})

describe('extractStatusSummary', () => {
  it('falls back to status lines in the subject', () => {
    expect(extractStatusSummary('[web] [Up] Back online', 'nothing here')).toBe(
      '[web] [Up] Back online'
    )
  })

  it('returns null when neither subject nor body has status lines', () => {
    expect(extractStatusSummary('Question', 'How do I rotate keys?')).toBeNull()
  })
})

describe('extractMessage', () => {
  it('uses a placeholder for whitespace-only bodies', () => {
    expect(extractMessage('Hello', '   \n ')).toEqual({
      cleanText: EMPTY_BODY_PLACEHOLDER,
      extractionPath: 'empty',
    })
  })

  it('uses a placeholder when HTML has no visible text', () => {
    expect(
      extractMessage('Hello', '<script>console.log("x")</script>')
    ).toEqual({
      cleanText: NO_READABLE_TEXT_PLACEHOLDER,
      extractionPath: 'no-readable-text',
    })
  })

  it('extracts the greeting-to-closing window from HTML', () => {
    const body =
      '<p>Hello team,</p><p>Our server is slow.</p><p>Thanks</p>'

    expect(extractMessage('Slow server', body)).toEqual({
      cleanText: 'Hello team,\nOur server is slow.',
      extractionPath: 'greeting-window',
    })
  })

  it('decodes quoted-printable before extracting', () => {
    const body = 'Hello team,=0AThe caf=C3=A9 is closed.=0AThanks'

    expect(normalize('Cafe', body)).toBe('Hello team,\nThe café is closed.')
  })

  it('pretty-prints an embedded JSON payload', () => {
    const body =
      'Alert payload: {"accountId": "123456789012", "state": "ALARM"} end'

    expect(extractMessage('ALARM', body)).toEqual({
      cleanText: '{\n  "accountId": "123456789012",\n  "state": "ALARM"\n}',
      extractionPath: 'json-block',
    })
  })

  it('cuts a CloudWatch alarm at the first section-end marker', () => {
    const body = [
      `${CLOUDWATCH_PREAMBLE} "HighCPU" in the US East region has entered the ALARM state.`,
      'Alarm Details:',
      '- Name: HighCPU',
      '- Threshold: 80',
      'Top 5 processes',
      'nginx 80%',
    ].join('\n')

    expect(extractMessage('ALARM: "HighCPU"', body)).toEqual({
      cleanText: [
        `${CLOUDWATCH_PREAMBLE} "HighCPU" in the US East region has entered the ALARM state.`,
        'Alarm Details:',
        '- Name: HighCPU',
        '- Threshold: 80',
      ].join('\n'),
      extractionPath: 'cloudwatch-alarm',
    })
  })

  it('keeps only status and time lines from uptime notifications', () => {
    const body = [
      '[api.example.com] [🔴 Down] Connection timeout',
      'Time (UTC): 2026-01-05 10:00',
      'Manage your notification settings',
    ].join('\n')

    expect(extractMessage('Monitor alert', body)).toEqual({
      cleanText:
        '[api.example.com] [🔴 Down] Connection timeout\nTime (UTC): 2026-01-05 10:00',
      extractionPath: 'status-summary',
    })
  })

  it('drops quoted reply history', () => {
    const body =
      'Please reset my password.\nOn Mon, Jan 5, 2026 someone wrote:\n> old'

    expect(extractMessage('Password', body)).toEqual({
      cleanText: 'Please reset my password.',
      extractionPath: 'raw',
    })
  })

  it('drops everything from the signature delimiter on', () => {
    const body = 'The VPN drops every hour.\n--\nJane Doe\nOps'

    expect(normalize('VPN', body)).toBe('The VPN drops every hour.')
  })

  it('uses a placeholder when quoted-printable decodes to invalid UTF-8', () => {
    expect(extractMessage('Hello', '=FF=FE')).toEqual({
      cleanText: NO_READABLE_TEXT_PLACEHOLDER,
      extractionPath: 'no-readable-text',
    })
  })

  it('keeps every line of a long body with no greeting window', () => {
    const line = 'The export job keeps failing on row 12.'
    const body = `Hello team,\n${`${line}\n`.repeat(2000)}Regards\nSam`

    const message = extractMessage('Export failing', body)

    expect(message.extractionPath).toBe('raw')
    expect(message.cleanText).toBe(
      `Hello team,\n${Array(2000).fill(line).join('\n')}`
    )
  })

  it('uses a placeholder when only a sign-off is left', () => {
    expect(extractMessage('Note', 'Thanks for everything')).toEqual({
      cleanText: NO_MEANINGFUL_CONTENT_PLACEHOLDER,
      extractionPath: 'no-meaningful-content',
    })
  })
})
