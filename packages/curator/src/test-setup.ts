/**
 * Test setup for @partyset/curator
 * Services log through ServiceLogger to the console; keep test output quiet.
 * Tests that assert on console output spy on it themselves.
 */

import {beforeEach, vi} from 'vitest'

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})
