/**
 * Tests for plugin-manifest.ts
 */

import { describe, it, expect } from 'vitest'
import {
  namespaceFromId,
  normalizeStringList,
  parseManifest,
  parseManifestText,
  validatePluginId
} from '../../src/lib/plugin-manifest.js'
import { MalformedManifestError } from '../../src/lib/errors.js'

describe('plugin-manifest', () => {
  describe('normalizeStringList', () => {
    it('should trim, drop empties and de-duplicate in order', () => {
      expect(normalizeStringList([' b ', 'a', '', 'b', '  ', 'a'])).toEqual(['b', 'a'])
    })

    it('should treat undefined as empty', () => {
      expect(normalizeStringList(undefined)).toEqual([])
    })
  })

  describe('namespaceFromId', () => {
    it('should return the part before the slash', () => {
      expect(namespaceFromId(' acme/widgets ')).toBe('acme')
    })

    it('should return empty for ids without a namespace', () => {
      expect(namespaceFromId('widgets')).toBe('')
    })
  })

  describe('validatePluginId', () => {
    it('should accept namespaced lowercase ids', () => {
      expect(() => validatePluginId('acme/widgets-2.x_y')).not.toThrow()
    })

    it('should require an id', () => {
      expect(() => validatePluginId('  ')).toThrow('plugin id required')
    })

    it('should require exactly one slash', () => {
      expect(() => validatePluginId('widgets')).toThrow('plugin id must be namespaced as <namespace>/<name>')
      expect(() => validatePluginId('a/b/c')).toThrow('plugin id must be namespaced as <namespace>/<name>')
    })

    it('should reject uppercase and dot segments', () => {
      expect(() => validatePluginId('Acme/widgets')).toThrow('invalid plugin id segment "Acme"')
      expect(() => validatePluginId('acme/..')).toThrow('invalid plugin id segment ".."')
    })
  })

  describe('parseManifest', () => {
    it('should fill defaults for a minimal manifest', () => {
      expect(parseManifest({ id: 'acme/widgets' })).toEqual({
        schema_version: 1,
        id: 'acme/widgets',
        namespace: 'acme',
        install: { type: 'none' },
        integration: {}
      })
    })

    it('should trim strings, lowercase enums and normalize lists', () => {
      const manifest = parseManifest({
        id: ' acme/search ',
        name: ' Search ',
        maturity: ' GA ',
        kind: 'Tool',
        install: { type: 'MCP_HTTP', source: ' https://mcp.example.test/search ' },
        integration: {
          capabilities: [' search ', 'search', '', 'index'],
          commands: ['find', ' find ']
        }
      })

      expect(manifest).toEqual({
        schema_version: 1,
        id: 'acme/search',
        namespace: 'acme',
        name: 'Search',
        maturity: 'ga',
        kind: 'tool',
        install: { type: 'mcp_http', source: 'https://mcp.example.test/search' },
        integration: { commands: ['find'], capabilities: ['search', 'index'] }
      })
    })

    it('should drop wrong-typed fields instead of failing', () => {
      const manifest = parseManifest({
        id: 'acme/widgets',
        summary: 42,
        install: { type: 'git', source: 'https://git.example.test/widgets.git', params: { ref: 'main', depth: 1 } },
        integration: { commands: 'not-a-list' }
      })

      expect(manifest.summary).toBeUndefined()
      expect(manifest.install).toEqual({
        type: 'git',
        source: 'https://git.example.test/widgets.git',
        params: { ref: 'main' }
      })
      expect(manifest.integration).toEqual({})
    })

    it('should normalize mcp servers', () => {
      const manifest = parseManifest({
        id: 'acme/tools',
        install: { type: 'mcp_http' },
        integration: {
          mcp_servers: [
            { name: ' local ', transport: 'STDIO', command: ['acme-tools', ' serve ', ''] },
            { name: 'remote', transport: 'http', endpoint: 'https://mcp.example.test/tools' }
          ]
        }
      })

      expect(manifest.integration.mcp_servers).toEqual([
        { name: 'local', transport: 'stdio', command: ['acme-tools', 'serve'] },
        { name: 'remote', transport: 'http', endpoint: 'https://mcp.example.test/tools' }
      ])
    })

    it('should keep non-empty metadata only', () => {
      expect(parseManifest({ id: 'acme/a', metadata: {} }).metadata).toBeUndefined()
      expect(parseManifest({ id: 'acme/a', metadata: { tier: 2 } }).metadata).toEqual({ tier: 2 })
    })

    it('should reject non-object values', () => {
      expect(() => parseManifest([])).toThrow('manifest must be a JSON object')
      expect(() => parseManifest(null)).toThrow(MalformedManifestError)
    })

    it('should report schema failures', () => {
      expect(() => parseManifest({ id: 'acme/a', metadata: 'oops' })).toThrow(
        'metadata: Expected object, received string'
      )
    })

    it('should reject a namespace that does not match the id', () => {
      expect(() => parseManifest({ id: 'acme/widgets', namespace: 'other' })).toThrow(
        'namespace "other" does not match id namespace "acme"'
      )
    })

    it('should reject a negative schema version', () => {
      expect(() => parseManifest({ id: 'acme/widgets', schema_version: -1 })).toThrow('schema_version must be >= 1')
    })

    it('should reject unknown maturity and install types', () => {
      expect(() => parseManifest({ id: 'acme/a', maturity: 'stable' })).toThrow('unsupported maturity "stable"')
      expect(() => parseManifest({ id: 'acme/a', install: { type: 'zip' } })).toThrow(
        'unsupported install.type "zip"'
      )
    })

    it('should require a source for local_path installs', () => {
      expect(() => parseManifest({ id: 'acme/a', install: { type: 'local_path' } })).toThrow(
        'install.source required for install.type=local_path'
      )
    })

    it('should require a source or servers for mcp_http installs', () => {
      expect(() => parseManifest({ id: 'acme/a', install: { type: 'mcp_http' } })).toThrow(
        'install.source or integration.mcp_servers required for install.type=mcp_http'
      )
    })

    it('should require absolute urls', () => {
      expect(() => parseManifest({ id: 'acme/a', homepage: 'not a url' })).toThrow(
        'invalid homepage: absolute URL required'
      )
      expect(() => parseManifest({ id: 'acme/a', terms_url: 'mailto:legal' })).toThrow(
        'invalid terms_url: absolute URL required'
      )
    })

    it('should validate each mcp server transport', () => {
      const withServer = (server: Record<string, unknown>) => ({
        id: 'acme/a',
        integration: { mcp_servers: [server] }
      })

      expect(() => parseManifest(withServer({ name: '', transport: 'stdio' }))).toThrow(
        'integration.mcp_servers.name required'
      )
      expect(() => parseManifest(withServer({ name: 'srv', transport: 'stdio' }))).toThrow(
        'integration.mcp_servers[srv].command required for stdio transport'
      )
      expect(() => parseManifest(withServer({ name: 'srv', transport: 'sse' }))).toThrow(
        'integration.mcp_servers[srv].endpoint required for sse transport'
      )
      expect(() => parseManifest(withServer({ name: 'srv', transport: 'ws' }))).toThrow(
        'unsupported integration.mcp_servers[srv].transport "ws"'
      )
    })

    it('should prefix validation errors with the source', () => {
      expect(() => parseManifest({ id: 'widgets' }, 'plugins/sun.plugin.json')).toThrow(
        'plugins/sun.plugin.json: plugin id must be namespaced as <namespace>/<name>'
      )
    })
  })

  describe('parseManifestText', () => {
    it('should parse JSON text', () => {
      expect(parseManifestText('{"id":"acme/widgets","version":"1.2.0"}').version).toBe('1.2.0')
    })

    it('should report invalid JSON', () => {
      expect(() => parseManifestText('{')).toThrow(/^parse manifest: /)
    })

    it('should carry the source on parse failures', () => {
      try {
        parseManifestText('{', 'x/sun.plugin.json')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedManifestError)
        expect(err).toMatchObject({ code: 'MALFORMED_MANIFEST', context: { source: 'x/sun.plugin.json' } })
      }
    })
  })
})
