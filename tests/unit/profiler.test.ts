import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { AmbiguousCopySource, IncompleteMetadata } from '../../src/errors'
import { CopyMetaField } from '../../src/metafields'
import { Profile } from '../../src/profile'
import { Profiler } from '../../src/profiler'
import { MemoryFileRegistry } from '../../src/registry'
import {
  createInputTemplate,
  createOutputTemplate,
  createRegistry,
  filenames,
  textMetadata,
} from '../fixtures/helpers'

describe('Profiler', () => {
  const textinput = createInputTemplate('textinput', false)
  const settings = createInputTemplate('settings', false)

  const tokenize = new Profile({
    id: 'tokenize',
    input: [textinput],
    output: [
      createOutputTemplate({
        id: 'tokens',
        unique: false,
        extension: 'tok',
        removeExtensions: ['txt'],
        copyMetadata: true,
      }),
    ],
  })
  const configure = new Profile({
    id: 'configure',
    input: [textinput, settings],
    output: [
      createOutputTemplate({
        id: 'configured',
        unique: false,
        extension: 'cfg',
        parent: 'textinput',
        metafields: [new CopyMetaField('encoding', 'settings')],
      }),
    ],
  })

  let registry: MemoryFileRegistry

  beforeEach(() => {
    registry = new MemoryFileRegistry()
    registry.register('textinput', 'a.txt', 1, textMetadata())
    registry.register('settings', 's1.cfg', 0, textMetadata({ encoding: 'ascii' }))
    registry.register('settings', 's2.cfg', 0, textMetadata({ encoding: 'utf-8' }))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('Lookup', () => {
    const profiler = new Profiler([configure, tokenize])

    it('should find profiles and templates by id', () => {
      expect(profiler.getProfile('tokenize')).toBe(tokenize)
      expect(profiler.getProfile('missing')).toBeUndefined()
      expect(profiler.getInputTemplate('settings')).toBe(settings)
      expect(profiler.getOutputTemplate('tokens')?.extension).toBe('tok')
      expect(profiler.getOutputTemplate('missing')).toBeUndefined()
    })

    it('should default to the last copy policy', () => {
      expect(profiler.settings.copyPolicy).toBe('last')
    })
  })

  describe('resolve', () => {
    it('should generate the outputs of every matching profile in order', () => {
      const profiler = new Profiler([configure, tokenize])

      const resolutions = profiler.resolve(registry, {})

      expect(resolutions.map((r) => r.profile.id)).toEqual(['configure', 'tokenize'])
      expect(filenames(resolutions[0]?.outputs ?? [])).toEqual(['a.txt.cfg'])
      expect(resolutions[0]?.outputs[0]?.metadata.get('encoding')).toBe('utf-8')
      expect(filenames(resolutions[1]?.outputs ?? [])).toEqual(['a.tok'])
    })

    it('should skip profiles that do not match', () => {
      const profiler = new Profiler([configure, tokenize])
      const textOnly = createRegistry([['textinput', 'a.txt', 1]])

      expect(profiler.matchingProfiles(textOnly, {}).map((p) => p.id)).toEqual(['tokenize'])
      expect(profiler.resolve(textOnly, {}).map((r) => r.profile.id)).toEqual(['tokenize'])
    })

    it('should stop after the first match in first mode', () => {
      const profiler = new Profiler([configure, tokenize])
      expect(profiler.resolve(registry, {}, { mode: 'first' }).map((r) => r.profile.id)).toEqual(['configure'])
    })

    it('should continue past a profile that fails to generate', () => {
      const profiler = new Profiler([configure, tokenize], { serviceId: 'tokenizer', settings: { copyPolicy: 'error' } })

      const [failed, succeeded] = profiler.resolve(registry, {})

      expect(failed?.error).toBeInstanceOf(AmbiguousCopySource)
      expect(failed?.outputs).toEqual([])
      expect(succeeded?.error).toBeUndefined()
      expect(filenames(succeeded?.outputs ?? [])).toEqual(['a.tok'])
      expect(console.warn).toHaveBeenCalledWith(
        "[formatprofiles] profile 'configure' failed to generate: Copy of 'encoding' from 'settings' matches 2 files: s1.cfg, s2.cfg"
      )
    })

    it('should pass the first copy policy to generation', () => {
      const profiler = new Profiler([configure], { settings: { copyPolicy: 'first' } })

      const [resolution] = profiler.resolve(registry, {})
      expect(resolution?.outputs[0]?.metadata.get('encoding')).toBe('ascii')
    })

    it('should let errors other than generation errors propagate', () => {
      const broken = new Profile({
        id: 'broken',
        input: [textinput],
        output: [createOutputTemplate({ id: 'bare', unique: false, extension: 'out' })],
      })
      const profiler = new Profiler([broken, tokenize])

      expect(() => profiler.resolve(registry, {})).toThrow(IncompleteMetadata)
    })
  })
})
