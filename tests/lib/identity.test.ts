/**
 * Tests for identity.ts
 */

import { describe, it, expect } from 'vitest'
import {
  sanitizeSlug,
  sanitizeOperatorId,
  firstNonEmpty,
  localUserName,
  resolveAgentIdentity,
  resolveMachineId,
  resolveOperatorId
} from '../../src/lib/identity.js'

describe('identity', () => {
  describe('sanitizeSlug', () => {
    it('should lowercase and replace disallowed characters', () => {
      expect(sanitizeSlug('  Build Box #2 ')).toBe('build-box--2')
      expect(sanitizeSlug('Worker_1.local')).toBe('worker_1.local')
    })

    it('should trim leading and trailing dashes', () => {
      expect(sanitizeSlug('--box--')).toBe('box')
      expect(sanitizeSlug('@@@')).toBe('')
    })
  })

  describe('sanitizeOperatorId', () => {
    it('should keep case and operator punctuation', () => {
      expect(sanitizeOperatorId('op:Alice@Box-1')).toBe('op:Alice@Box-1')
      expect(sanitizeOperatorId('bob smith')).toBe('bob-smith')
    })
  })

  describe('firstNonEmpty', () => {
    it('should skip blank values', () => {
      expect(firstNonEmpty(undefined, '  ', ' x ')).toBe('x')
      expect(firstNonEmpty()).toBe('')
    })
  })

  describe('localUserName', () => {
    it('should read USER, then USERNAME, then fall back', () => {
      expect(localUserName({ USER: 'alice', USERNAME: 'other' })).toBe('alice')
      expect(localUserName({ USERNAME: 'bob' })).toBe('bob')
      expect(localUserName({})).toBe('user')
    })
  })

  describe('resolveAgentIdentity', () => {
    it('should build a dyad id from user and machine', () => {
      const identity = resolveAgentIdentity({ settings: {}, env: { USER: 'Alice' }, hostname: 'Build-Box' })
      expect(identity).toEqual({ agentId: 'dyad:alice@build-box', dyad: '', machine: 'build-box', user: 'alice' })
    })

    it('should prefer the dyad name over the user', () => {
      const identity = resolveAgentIdentity({ settings: {}, dyad: 'Pair A', machine: 'box', env: { USER: 'alice' } })
      expect(identity.agentId).toBe('dyad:pair-a@box')
      expect(identity.dyad).toBe('pair-a')
    })

    it('should use an explicit agent, then the configured one, lowercased', () => {
      expect(resolveAgentIdentity({ settings: { taskboard_agent: 'Agent-X' }, agent: 'Bot-1', hostname: 'box' }).agentId).toBe('bot-1')
      expect(resolveAgentIdentity({ settings: { taskboard_agent: 'Agent-X' }, hostname: 'box' }).agentId).toBe('agent-x')
    })

    it('should take the machine from settings before the host name', () => {
      const identity = resolveAgentIdentity({ settings: { machine_id: 'Configured' }, env: { USER: 'a' }, hostname: 'host' })
      expect(identity.machine).toBe('configured')
    })
  })

  describe('resolveMachineId', () => {
    it('should walk explicit, configured, then host name', () => {
      expect(resolveMachineId({ machine_id: 'cfg' }, 'Explicit', 'host')).toBe('explicit')
      expect(resolveMachineId({ machine_id: 'cfg' }, '', 'host')).toBe('cfg')
      expect(resolveMachineId({}, '', 'Host.Local')).toBe('host.local')
    })

    it('should fall back to machine-unknown', () => {
      expect(resolveMachineId({}, '', '')).toBe('machine-unknown')
    })
  })

  describe('resolveOperatorId', () => {
    it('should prefer explicit then configured operators', () => {
      expect(resolveOperatorId({ operator_id: 'op:cfg' }, 'op:Me', 'box', {})).toBe('op:Me')
      expect(resolveOperatorId({ operator_id: 'op:cfg' }, '', 'box', {})).toBe('op:cfg')
    })

    it('should derive op:<user>@<machine>', () => {
      expect(resolveOperatorId({}, '', 'Build Box', { USER: 'Alice' })).toBe('op:alice@build-box')
    })
  })
})
