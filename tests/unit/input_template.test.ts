import { describe, it, expect, beforeEach } from 'vitest'
import { MetadataConstraint } from '../../src/constraints'
import { ConfigurationError, SchemaViolation, ValidationError } from '../../src/errors'
import { PlainTextFormat, TokenizedTextFormat } from '../../src/formats'
import { assertValid, InputTemplate } from '../../src/input_template'
import { MetadataRecord } from '../../src/metadata'
import { Parameter } from '../../src/parameters'
import { createInputTemplate, createRegistry, textMetadata } from '../fixtures/helpers'

describe('InputTemplate', () => {
  let template: InputTemplate

  beforeEach(() => {
    template = new InputTemplate({
      id: 'textinput',
      format: PlainTextFormat,
      label: 'Text input',
      extension: 'txt',
      parameters: [
        new Parameter({ id: 'encoding', type: 'choice', choices: ['utf-8', 'ascii'], required: true }),
        new Parameter({ id: 'language', type: 'string', forbid: ['autodetect'] }),
        new Parameter({ id: 'autodetect', type: 'boolean' }),
        new Parameter({ id: 'dialect', type: 'string', require: ['language'] }),
      ],
    })
  })

  describe('Construction', () => {
    it('should default to unique', () => {
      expect(template.unique).toBe(true)
    })

    it('should reject ids with path separators', () => {
      expect(() => createInputTemplate('text/input')).toThrow(ConfigurationError)
    })

    it('should require # in the filename of a non-unique template', () => {
      expect(
        () => new InputTemplate({ id: 'doc', format: PlainTextFormat, label: 'Doc', unique: false, filename: 'doc.txt' })
      ).toThrow(ConfigurationError)
    })

    it('should reject duplicate parameter ids', () => {
      const parameters = [new Parameter({ id: 'p', type: 'string' }), new Parameter({ id: 'p', type: 'integer' })]
      expect(() => new InputTemplate({ id: 'doc', format: PlainTextFormat, label: 'Doc', parameters })).toThrow(
        "Duplicate parameter 'p' in input template 'doc'"
      )
    })
  })

  describe('matchingFiles', () => {
    it('should match a unique template with exactly one file', () => {
      const registry = createRegistry([['textinput', 'a.txt', 1]])
      expect(template.matchingFiles(registry).map((f) => f.filename)).toEqual(['a.txt'])
    })

    it('should not match a unique template with several files', () => {
      const registry = createRegistry([
        ['textinput', 'a.txt', 1],
        ['textinput', 'b.txt', 2],
      ])
      expect(template.matchingFiles(registry)).toEqual([])
    })

    it('should return the files of a multi template in sequence order', () => {
      const multi = createInputTemplate('doc', false)
      const registry = createRegistry([
        ['doc', 'c.txt', 3],
        ['doc', 'a.txt', 1],
        ['doc', 'b.txt', 2],
      ])

      expect(multi.matchingFiles(registry).map((f) => f.filename)).toEqual(['a.txt', 'b.txt', 'c.txt'])
    })

    it('should not match without files', () => {
      expect(createInputTemplate('doc', false).matchingFiles(createRegistry([]))).toEqual([])
    })
  })

  describe('match', () => {
    const lexicon = new InputTemplate({
      id: 'lexicon',
      format: PlainTextFormat,
      label: 'Lexicon',
      constraints: [
        new MetadataConstraint({ key: 'encoding', value: ['utf-8', 'ascii'] }),
        new MetadataConstraint({ key: 'language', value: 'fr', operator: 'notequals' }),
      ],
    })

    it('should accept metadata that meets every constraint', () => {
      expect(lexicon.match(textMetadata({ language: 'nl' }))).toBe(true)
      expect(lexicon.match(textMetadata({ encoding: 'ascii' }))).toBe(true)
    })

    it('should reject metadata that breaks a constraint', () => {
      expect(lexicon.match(textMetadata({ encoding: 'iso-8859-1' }))).toBe(false)
      expect(lexicon.match(textMetadata({ language: 'fr' }))).toBe(false)
    })

    it('should reject metadata of another format', () => {
      const tokens = new MetadataRecord(TokenizedTextFormat, { encoding: 'utf-8' })
      expect(lexicon.match(tokens)).toBe(false)
    })

    it('should list its constraints in toJSON', () => {
      expect(lexicon.toJSON().constraints).toEqual([
        { key: 'encoding', operator: 'equals', value: ['utf-8', 'ascii'] },
        { key: 'language', operator: 'notequals', value: 'fr' },
      ])
      expect('constraints' in template.toJSON()).toBe(false)
    })
  })

  describe('validate', () => {
    it('should accept a complete submission', () => {
      const result = template.validate({ encoding: 'utf-8', language: 'en' })

      expect(result.hasErrors).toBe(false)
      expect(result.parameters.map((p) => p.value)).toEqual(['utf-8', 'en', undefined, undefined])
    })

    it('should flag missing required parameters', () => {
      const result = template.validate({})

      expect(result.hasErrors).toBe(true)
      expect(result.parameters[0]?.error).toBe('This parameter is required')
    })

    it('should record coercion errors', () => {
      const result = template.validate({ encoding: 'latin-9' })

      expect(result.hasErrors).toBe(true)
      expect(result.parameters[0]?.error).toBe("Invalid choice 'latin-9'")
    })

    it('should flag forbidden combinations on both parameters', () => {
      const result = template.validate({ encoding: 'utf-8', language: 'en', autodetect: 'yes' })

      expect(result.hasErrors).toBe(true)
      expect(result.parameters[1]?.error).toBe("Can not be set together with 'autodetect'")
      expect(result.parameters[2]?.error).toBe("Can not be set together with 'language'")
    })

    it('should flag a missing required companion', () => {
      const result = template.validate({ encoding: 'utf-8', dialect: 'flemish' })

      expect(result.hasErrors).toBe(true)
      expect(result.parameters[3]?.error).toBe("Requires 'language' to be set as well")
    })

    it('should refuse parameters the user may not set', () => {
      const restricted = new InputTemplate({
        id: 'doc',
        format: PlainTextFormat,
        label: 'Doc',
        parameters: [new Parameter({ id: 'encoding', type: 'string', allowUsers: ['admin'] })],
      })

      const result = restricted.validate({ encoding: 'utf-8' }, 'guest')
      expect(result.hasErrors).toBe(true)
      expect(result.parameters[0]?.error).toBe('You are not allowed to set this parameter')
      expect(restricted.validate({ encoding: 'utf-8' }, 'admin').hasErrors).toBe(false)
    })

    it('should not require parameters the user may not set', () => {
      const restricted = new InputTemplate({
        id: 'doc',
        format: PlainTextFormat,
        label: 'Doc',
        parameters: [new Parameter({ id: 'encoding', type: 'string', required: true, allowUsers: ['admin'] })],
      })

      const result = restricted.validate({}, 'guest')
      expect(result.hasErrors).toBe(false)
      expect(result.parameters[0]?.error).toBeUndefined()
      expect(restricted.validate({}, 'admin').parameters[0]?.error).toBe('This parameter is required')
    })

    it('should throw the collected problems through assertValid', () => {
      const result = template.validate({ dialect: 'flemish' })

      expect(() => assertValid(result)).toThrow(ValidationError)
      expect(() => assertValid(result)).toThrow(
        "Parameter validation failed: encoding: This parameter is required; dialect: Requires 'language' to be set as well"
      )
      expect(() => assertValid(template.validate({ encoding: 'ascii' }))).not.toThrow()
    })

    it('should never modify the template parameters', () => {
      template.validate({ encoding: 'utf-8', language: 'en' })
      template.validate({})

      expect(template.parameters.map((p) => p.value)).toEqual([undefined, undefined, undefined, undefined])
      expect(template.parameters.map((p) => p.error)).toEqual([undefined, undefined, undefined, undefined])
    })
  })

  describe('generate', () => {
    it('should build metadata from the submitted parameters', () => {
      const result = template.generate({ encoding: 'utf-8', language: 'en' })

      expect(result.hasErrors).toBe(false)
      if (result.hasErrors) return
      expect(result.metadata.toJSON()).toEqual({
        format: 'PlainTextFormat',
        mimetype: 'text/plain',
        inputtemplate: 'textinput',
        attributes: { encoding: 'utf-8', language: 'en' },
      })
    })

    it('should return the parameters with errors instead of metadata', () => {
      const result = template.generate({})

      expect(result.hasErrors).toBe(true)
      expect('metadata' in result).toBe(false)
    })

    it('should reuse a prior validation', () => {
      const validation = template.validate({ encoding: 'ascii' })
      const result = template.generate({ encoding: 'utf-8' }, undefined, validation)

      if (result.hasErrors) throw new Error('expected metadata')
      expect(result.metadata.get('encoding')).toBe('ascii')
    })

    it('should let the format reject parameters it does not declare', () => {
      const loose = new InputTemplate({
        id: 'doc',
        format: PlainTextFormat,
        label: 'Doc',
        parameters: [
          new Parameter({ id: 'encoding', type: 'string' }),
          new Parameter({ id: 'author', type: 'string' }),
        ],
      })

      expect(() => loose.generate({ encoding: 'utf-8', author: 'someone' })).toThrow(SchemaViolation)
    })
  })

  describe('filenameFor', () => {
    it('should keep the uploaded name and add the extension', () => {
      expect(template.filenameFor('/tmp/uploads/notes', 1)).toBe('notes.txt')
      expect(template.filenameFor('notes.TXT', 1)).toBe('notes.TXT')
    })

    it('should use a literal filename for unique templates', () => {
      const lexicon = new InputTemplate({ id: 'lexicon', format: PlainTextFormat, label: 'Lexicon', filename: 'lexicon.txt' })
      expect(lexicon.filenameFor('words.txt', 3)).toBe('lexicon.txt')
    })

    it('should substitute the sequence number for multi templates', () => {
      const doc = new InputTemplate({ id: 'doc', format: PlainTextFormat, label: 'Doc', unique: false, filename: 'doc#.txt' })
      expect(doc.filenameFor('whatever.txt', 4)).toBe('doc4.txt')
    })
  })
})
