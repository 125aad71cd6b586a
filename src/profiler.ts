import { loadServiceConfig } from "./config";
import type { ServiceDefinition, ServiceSettings } from "./config";
import { GenerationError } from "./errors";
import type { FormatClass } from "./metadata";
import type { InputTemplate } from "./input_template";
import type { OutputTemplate } from "./output_template";
import type { Profile } from "./profile";
import type { FileRegistry, GeneratedOutput, GenerateOptions, SubmittedParameters } from "./types";

export interface ProfilerOptions {
  serviceId?: string;
  settings?: Partial<ServiceSettings>;
  formats?: Record<string, FormatClass>;
}

export interface ResolveOptions {
  /** "first" stops after the first matching profile; defaults to "all" */
  mode?: "all" | "first";
}

export interface ProfileResolution {
  profile: Profile;
  outputs: GeneratedOutput[];
  /** Set when generation failed; outputs then holds what was produced before the failure */
  error?: GenerationError;
}

/**
 * The registry of a service's profiles and the entry point for resolving a
 * submission against them.
 *
 * Built once at startup and handed to whoever handles requests.
 *
 * @example
 * ```typescript
 * const profiler = Profiler.fromConfig("config/service.yml");
 * const [first] = profiler.resolve(registry, { lang: "en" });
 * first?.outputs.map((o) => o.filename);
 * // [ 'doc1.tok', 'doc2.tok' ]
 * ```
 */
export class Profiler {
  readonly profiles: readonly Profile[];
  readonly serviceId?: string;
  readonly settings: ServiceSettings;
  readonly formats: Readonly<Record<string, FormatClass>>;

  constructor(profiles: Profile[], options: ProfilerOptions = {}) {
    this.profiles = [...profiles];
    this.serviceId = options.serviceId;
    this.settings = { copyPolicy: options.settings?.copyPolicy ?? "last" };
    this.formats = { ...(options.formats ?? {}) };
  }

  static fromConfig(source: string | Record<string, unknown>): Profiler {
    return Profiler.fromDefinition(loadServiceConfig(source));
  }

  static fromDefinition(definition: ServiceDefinition): Profiler {
    return new Profiler(definition.profiles, {
      serviceId: definition.serviceId,
      settings: definition.settings,
      formats: definition.formats,
    });
  }

  getProfile(id: string): Profile | undefined {
    return this.profiles.find((profile) => profile.id === id);
  }

  getInputTemplate(id: string): InputTemplate | undefined {
    for (const profile of this.profiles) {
      const template = profile.getInputTemplate(id);
      if (template) return template;
    }
    return undefined;
  }

  getOutputTemplate(id: string): OutputTemplate | undefined {
    for (const profile of this.profiles) {
      const template = profile.outputTemplates().find((t) => t.id === id);
      if (template) return template;
    }
    return undefined;
  }

  /** Profiles that match, in declaration order */
  matchingProfiles(registry: FileRegistry, parameters: SubmittedParameters): Profile[] {
    return this.profiles.filter((profile) => profile.match(registry, parameters));
  }

  /**
   * Match every profile and generate the outputs of each match.
   *
   * A GenerationError ends that profile's generation only; it is logged and
   * recorded on the profile's result. Any other error propagates.
   */
  resolve(
    registry: FileRegistry,
    parameters: SubmittedParameters,
    options: ResolveOptions = {}
  ): ProfileResolution[] {
    const generateOptions: GenerateOptions = {
      copyPolicy: this.settings.copyPolicy,
      serviceId: this.serviceId,
    };
    const resolutions: ProfileResolution[] = [];

    for (const profile of this.profiles) {
      if (!profile.match(registry, parameters)) continue;

      const outputs: GeneratedOutput[] = [];
      try {
        for (const output of profile.generate(registry, parameters, generateOptions)) {
          outputs.push(output);
        }
        resolutions.push({ profile, outputs });
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        console.warn(`[formatprofiles] profile '${profile.id}' failed to generate: ${error.message}`);
        resolutions.push({ profile, outputs, error });
      }

      if (options.mode === "first") break;
    }
    return resolutions;
  }
}
