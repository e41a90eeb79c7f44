import { readFileSync } from 'fs';
import { z } from 'zod';
import { MAX_INTERVAL_SECONDS } from '../dr-logger/interval-scheduler';
import { WatcherConfig } from '../watchers/interfaces/watcher.interface';

/** Injection token for the parsed {@link SetupDefinition} list. */
export const SETUPS_CONFIG = Symbol('SETUPS_CONFIG');

const OptionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const SourceSchema = z.object({
  server: z.string().min(1),
  node: z.string().min(1),
  options: z.record(OptionValueSchema).default({}),
});

const SetupSchema = z.object({
  sources: z
    .record(SourceSchema)
    .refine((sources) => Object.keys(sources).length > 0, {
      message: 'A setup needs at least one source',
    }),
  datasetPath: z.array(z.string()).optional(),
  datasetName: z.string().min(1).optional(),
  timeInterval: z.number().positive().max(MAX_INTERVAL_SECONDS).optional(),
});

export const SetupsFileSchema = z.object({
  setups: z.record(SetupSchema),
});

export type SetupsFile = z.infer<typeof SetupsFileSchema>;

export interface SetupSource {
  /** Key in the setup's source map, e.g. 'diodes' */
  label: string;
  config: WatcherConfig;
}

/**
 * One cryostat setup, defaults applied.
 */
export interface SetupDefinition {
  name: string;
  sources: SetupSource[];
  datasetPath: string[];
  datasetName: string;
  /** Seconds */
  timeInterval: number;
}

export const DEFAULT_TIME_INTERVAL = 1;

export function toSetupDefinitions(file: SetupsFile): SetupDefinition[] {
  return Object.entries(file.setups).map(([name, setup]) => ({
    name,
    sources: Object.entries(setup.sources).map(([label, source]) => ({
      label,
      config: {
        sourceKind: source.server,
        node: source.node,
        options: source.options,
      },
    })),
    datasetPath: setup.datasetPath ?? ['', 'DR', name],
    datasetName: setup.datasetName ?? `${name} log - [t]`,
    timeInterval: setup.timeInterval ?? DEFAULT_TIME_INTERVAL,
  }));
}

/**
 * Parse setups from JSON text.
 * @throws Error listing every schema violation
 */
export function parseSetups(json: string, origin = 'setups'): SetupDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new Error(`Invalid JSON in ${origin}`, { cause: error });
  }

  const result = SetupsFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${origin}: ${problems}`);
  }
  return toSetupDefinitions(result.data);
}

export function loadSetupsFile(path: string): SetupDefinition[] {
  return parseSetups(readFileSync(path, 'utf-8'), path);
}
