/**
 * Generators for harness inputs: names, seeds and whole suite layouts whose
 * cases follow a scripted behaviour, so the expected counters can be derived
 * without running them.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { TestOutcome } from '../../../src/types'
import type { TestCase, TestSuite } from '../../../src/types'

// ============================================================================
// Names & Seeds
// ============================================================================

export const nameGen = (): Arbitrary<string> =>
  fc.stringMatching(/^[A-Za-z][A-Za-z0-9_]{0,11}$/)

export const runSeedGen = (): Arbitrary<string> =>
  fc.stringMatching(/^[0-9A-Z]{16}$/)

export const iterationGen = (): Arbitrary<number> => fc.integer({ min: 1, max: 10_000 })

// ============================================================================
// Scripted Cases
// ============================================================================

export type CaseBehaviour = 'pass' | 'fail' | 'noAsserts' | 'skip' | 'throw' | 'started'

export type CaseScript = {
  name: string
  enabled: boolean
  behaviour: CaseBehaviour
}

export type SuiteScript = {
  name: string
  cases: CaseScript[]
}

export const caseScriptGen = (): Arbitrary<CaseScript> =>
  fc.record({
    name: nameGen(),
    enabled: fc.boolean(),
    behaviour: fc.constantFrom<CaseBehaviour>('pass', 'fail', 'noAsserts', 'skip', 'throw', 'started'),
  })

export const suiteScriptsGen = (): Arbitrary<SuiteScript[]> =>
  fc.array(
    fc.record({
      name: nameGen(),
      cases: fc.array(caseScriptGen(), { maxLength: 4 }),
    }),
    { minLength: 1, maxLength: 4 }
  )

function buildCase(script: CaseScript): TestCase {
  return {
    name: script.name,
    enabled: script.enabled,
    run: (ctx) => {
      switch (script.behaviour) {
        case 'pass':
          ctx.assert.assert(true, 'scripted pass')
          return TestOutcome.COMPLETED
        case 'fail':
          ctx.assert.assert(false, 'scripted failure')
          return TestOutcome.COMPLETED
        case 'noAsserts':
          return TestOutcome.COMPLETED
        case 'skip':
          return TestOutcome.SKIPPED
        case 'throw':
          throw new Error('scripted throw')
        case 'started':
          return TestOutcome.STARTED
      }
    },
  }
}

export function buildSuites(scripts: readonly SuiteScript[]): TestSuite[] {
  return scripts.map((suite) => ({ name: suite.name, cases: suite.cases.map(buildCase) }))
}

/**
 * Expected per-iteration tally of a case when no filter is active.
 */
export function expectedTally(script: CaseScript): 'passed' | 'failed' | 'skipped' {
  if (!script.enabled) return 'skipped'
  switch (script.behaviour) {
    case 'pass':
      return 'passed'
    case 'skip':
      return 'skipped'
    default:
      return 'failed'
  }
}
