#!/usr/bin/env -S npx tsx

import { flushAxiom, initializeAxiom } from '@desk-triage/core'
import { createProgram } from './program'

initializeAxiom()

try {
  await createProgram().parseAsync(process.argv)
} finally {
  await flushAxiom()
}
