import * as yaml from "yaml";
import { existsSync, readFileSync, readdirSync } from "fs";
import { join } from "path";
import { isRecord } from "./config";
import { SchemaViolation } from "./errors";
import { BUILTIN_FORMATS, MetadataFormat } from "./formats";
import { MetadataRecord } from "./metadata";
import type { FormatClass } from "./metadata";
import type { FileRegistry, InputFile } from "./types";

export class MemoryFileRegistry implements FileRegistry {
  private files = new Map<string, InputFile>();
  private metadata = new Map<string, MetadataRecord>();

  register(templateId: string, filename: string, sequence: number, metadata?: MetadataRecord): InputFile {
    const file: InputFile = { templateId, sequence, filename };
    this.files.set(filename, file);
    if (metadata) {
      this.metadata.set(filename, metadata);
    } else {
      this.metadata.delete(filename);
    }
    return file;
  }

  unregister(filename: string): void {
    this.files.delete(filename);
    this.metadata.delete(filename);
  }

  lookupFilesForTemplate(templateId: string): InputFile[] {
    return [...this.files.values()]
      .filter((file) => file.templateId === templateId)
      .sort((a, b) => a.sequence - b.sequence);
  }

  getMetadata(filename: string): MetadataRecord | undefined {
    return this.metadata.get(filename);
  }
}

const SIDECAR_PATTERN = /^\.(.+)\.METADATA$/;

interface Sidecar {
  path: string;
  inputtemplate: string;
  sequence: number;
  format: string;
  attributes: Record<string, unknown>;
}

/**
 * Read-only registry over a directory of uploaded files.
 *
 * Every registered file `name` has a YAML sidecar `.name.METADATA`:
 *
 *   inputtemplate: textinput
 *   sequence: 2
 *   format: PlainTextFormat
 *   attributes:
 *     encoding: utf-8
 *
 * The directory is rescanned on every lookup.
 */
export class LocalFileRegistry implements FileRegistry {
  constructor(
    private dir: string,
    private formats: Readonly<Record<string, FormatClass>> = BUILTIN_FORMATS
  ) { }

  lookupFilesForTemplate(templateId: string): InputFile[] {
    if (!existsSync(this.dir)) return [];
    const found: InputFile[] = [];
    for (const entry of readdirSync(this.dir)) {
      const match = entry.match(SIDECAR_PATTERN);
      if (!match?.[1]) continue;
      const sidecar = this.readSidecar(match[1]);
      if (sidecar?.inputtemplate === templateId && this.toRecord(sidecar)) {
        found.push({ templateId, sequence: sidecar.sequence, filename: match[1] });
      }
    }
    return found.sort((a, b) => a.sequence - b.sequence);
  }

  getMetadata(filename: string): MetadataRecord | undefined {
    const sidecar = this.readSidecar(filename);
    return sidecar ? this.toRecord(sidecar) : undefined;
  }

  /** Files whose attributes break their format are skipped like unreadable ones */
  private toRecord(sidecar: Sidecar): MetadataRecord | undefined {
    const format = this.formats[sidecar.format] ?? MetadataFormat;
    try {
      return new MetadataRecord(format, sidecar.attributes, { inputTemplateId: sidecar.inputtemplate });
    } catch (error) {
      if (!(error instanceof SchemaViolation)) throw error;
      console.warn(`[formatprofiles] skipping metadata file with invalid attributes ${sidecar.path}: ${error.message}`);
      return undefined;
    }
  }

  private readSidecar(filename: string): Sidecar | undefined {
    const path = join(this.dir, `.${filename}.METADATA`);
    if (!existsSync(path)) return undefined;

    let parsed: unknown;
    try {
      parsed = yaml.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      console.warn(`[formatprofiles] skipping unreadable metadata file ${path}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
    if (!isRecord(parsed) || typeof parsed.inputtemplate !== "string") {
      console.warn(`[formatprofiles] skipping metadata file without inputtemplate: ${path}`);
      return undefined;
    }
    return {
      path,
      inputtemplate: parsed.inputtemplate,
      sequence: typeof parsed.sequence === "number" ? parsed.sequence : 0,
      format: typeof parsed.format === "string" ? parsed.format : MetadataFormat.id,
      attributes: isRecord(parsed.attributes) ? parsed.attributes : {},
    };
  }
}
