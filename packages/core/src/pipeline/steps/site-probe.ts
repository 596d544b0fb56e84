/**
 * Site status probe
 *
 * Uptime notifications link the monitored site as `[url | label]` or
 * `[label | url]`. When the site answers 2xx again, the dispatcher leaves a
 * private note with the probe report and closes the ticket.
 */

import type { SiteProbeResult, SiteProber } from '../types'

const SITE_LINK_PATTERN =
  /\[\s*(https?:\/\/[^\s\]]+)\s*\|\s*.*?\]|\[\s*.*?\|\s*(https?:\/\/[^\s\]]+)\s*\]/g

export const DEFAULT_PROBE_TIMEOUT_MS = 5000

export function extractSiteUrl(text: string): string | null {
  for (const match of text.matchAll(SITE_LINK_PATTERN)) {
    const url = match[1] ?? match[2]
    if (url) return url
  }
  return null
}

export interface HttpSiteProberOptions {
  timeoutMs?: number
  fetch?: typeof fetch
}

/**
 * SiteProber over `fetch`. Network failures and timeouts come back as a
 * down report rather than an error.
 */
export function createHttpSiteProber(
  options: HttpSiteProberOptions = {}
): SiteProber {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS

  return {
    async probe(url: string): Promise<SiteProbeResult> {
      const doFetch = options.fetch ?? fetch
      const startTime = Date.now()

      try {
        const response = await doFetch(url, {
          headers: { 'User-Agent': 'Mozilla/5.0' },
          signal: AbortSignal.timeout(timeoutMs),
        })
        const seconds = ((Date.now() - startTime) / 1000).toFixed(3)
        const headline = response.ok
          ? '✅ Site is Up and Running.'
          : response.status >= 400
            ? '❌ Site returned an HTTP error.'
            : '⚠️ Site responded but may have issues.'

        return {
          url,
          ok: response.ok,
          statusCode: response.status,
          report: [
            headline,
            `🔗 URL: ${url}`,
            `📶 Status: HTTP ${response.status} ${response.statusText}`.trimEnd(),
            `⏱️ Response Time: ${seconds}s`,
          ].join('\n'),
        }
      } catch (error) {
        return {
          url,
          ok: false,
          statusCode: null,
          report: [
            '❌ Site appears to be Down or Unreachable.',
            `🔗 URL: ${url}`,
            `💥 Error: ${error instanceof Error ? error.message : String(error)}`,
          ].join('\n'),
        }
      }
    },
  }
}
