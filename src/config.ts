import { z } from 'zod';
import { parseJson, validateDocument } from './document';

export const ApplicationConfigFileName = 'app-config.json';

/** When the host should install a staged release */
export const UpdatePhases = ['start', 'resume', 'now'] as const;
export type UpdatePhase = (typeof UpdatePhases)[number];

const applicationConfigSchema = z.object({
  release: z.string().min(1),
  min_native_interface: z.number().int().nonnegative().default(0),
  content_url: z.string().default(''),
  update: z.enum(UpdatePhases).default('resume'),
});

const jsonObjectSchema = z.record(z.string(), z.unknown());

export interface ApplicationConfig {
  /** Opaque release token, only ever compared by equality */
  readonly releaseVersion: string;
  /** Lowest native build that can run this release */
  readonly minimumNativeVersion: number;
  /** Base url of the release's content files, may be empty */
  readonly contentUrl: string;
  readonly updatePhase: UpdatePhase;
  /** Document as it was read, including keys this package does not use */
  readonly json: Readonly<Record<string, unknown>>;
}

export function parseApplicationConfig(input: unknown): ApplicationConfig {
  const json = validateDocument(ApplicationConfigFileName, jsonObjectSchema, input);
  const cfg = validateDocument(ApplicationConfigFileName, applicationConfigSchema, json);
  return Object.freeze({
    releaseVersion: cfg.release,
    minimumNativeVersion: cfg.min_native_interface,
    contentUrl: cfg.content_url,
    updatePhase: cfg.update,
    json: Object.freeze({ ...json }),
  });
}

export function readApplicationConfig(buf: Buffer | string): ApplicationConfig {
  return parseApplicationConfig(parseJson(ApplicationConfigFileName, buf));
}

export function serializeApplicationConfig(cfg: ApplicationConfig): string {
  return JSON.stringify(cfg.json, null, 2);
}
