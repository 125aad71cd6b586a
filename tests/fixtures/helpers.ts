import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { PlainTextFormat } from '../../src/formats'
import { InputTemplate } from '../../src/input_template'
import { MetadataRecord } from '../../src/metadata'
import type { FormatClass } from '../../src/metadata'
import { OutputTemplate } from '../../src/output_template'
import type { OutputTemplateOptions } from '../../src/output_template'
import { MemoryFileRegistry } from '../../src/registry'
import type { GeneratedOutput } from '../../src/types'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export function configPath(filename: string): string {
  return join(__dirname, 'configs', filename)
}

export const UPLOADS_DIR = join(__dirname, 'uploads')

/**
 * Load a YAML service definition from test fixtures
 */
export function loadTestConfig(filename: string): string {
  return readFileSync(configPath(filename), 'utf-8')
}

/**
 * Plain text metadata with the required encoding filled in
 */
export function textMetadata(attributes: Record<string, string> = {}, inputTemplateId?: string): MetadataRecord {
  return new MetadataRecord(PlainTextFormat, { encoding: 'utf-8', ...attributes }, { inputTemplateId })
}

export function createInputTemplate(id: string, unique = true, format: FormatClass = PlainTextFormat): InputTemplate {
  return new InputTemplate({ id, format, label: id, unique })
}

export function createOutputTemplate(overrides: Partial<OutputTemplateOptions> & { id: string }): OutputTemplate {
  return new OutputTemplate({ format: PlainTextFormat, label: overrides.id, ...overrides })
}

/**
 * Registry with one plain text file per entry: [templateId, filename, sequence]
 */
export function createRegistry(files: [string, string, number][]): MemoryFileRegistry {
  const registry = new MemoryFileRegistry()
  for (const [templateId, filename, sequence] of files) {
    registry.register(templateId, filename, sequence, textMetadata({}, templateId))
  }
  return registry
}

export function filenames(outputs: Iterable<GeneratedOutput>): string[] {
  return [...outputs].map((output) => output.filename)
}
