import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/radar.errors';
import {
  SourceSettings,
  StackDeclaration,
  TechnologyEntry,
} from '../types/radar.types';

const technologySchema = z.union([
  z
    .string()
    .trim()
    .min(1)
    .transform((name): TechnologyEntry => ({ name })),
  z.object({
    name: z.string().trim().min(1),
    description: z.string().trim().optional(),
    group: z.string().trim().min(1).optional(),
  }),
]);

const repoSchema = z
  .string()
  .trim()
  .regex(/^[\w.-]+\/[\w.-]+$/, 'expected "owner/repo"');

export const radarConfigSchema = z.object({
  project: z
    .object({
      context: z.string().default(''),
      technologies: z.array(technologySchema).default([]),
      // package.json whose dependencies extend the technology list
      manifestPath: z.string().trim().min(1).optional(),
    })
    .default({}),
  sources: z
    .object({
      rssFeeds: z.array(z.string().trim().url()).default([]),
      githubReleases: z.array(repoSchema).default([]),
    })
    .default({}),
  analysis: z
    .object({
      lookbackHours: z.number().positive().default(24),
      similarityThreshold: z.number().min(-1).max(1).optional(),
    })
    .default({}),
});

export type RadarConfigFile = z.infer<typeof radarConfigSchema>;

export interface RadarRunConfig {
  stack: StackDeclaration;
  sources: SourceSettings;
  lookbackHours: number;
  similarityThreshold: number;
}

export async function loadRadarConfig(
  configPath: string,
  thresholdOverride: number | null = null,
): Promise<RadarRunConfig> {
  const raw = await readJsonFile(configPath, 'config file');
  const parsed = radarConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid config at ${configPath}: ${issues}`);
  }

  const { project, sources, analysis } = parsed.data;
  const similarityThreshold = resolveThreshold(
    thresholdOverride,
    analysis.similarityThreshold,
  );

  let technologies: TechnologyEntry[] = project.technologies;
  if (project.manifestPath) {
    const manifestPath = path.resolve(
      path.dirname(configPath),
      project.manifestPath,
    );
    technologies = mergeTechnologies(
      technologies,
      await readManifestTechnologies(manifestPath),
    );
  }

  return {
    stack: { context: project.context.trim(), technologies },
    sources,
    lookbackHours: analysis.lookbackHours,
    similarityThreshold,
  };
}

export async function readManifestTechnologies(
  manifestPath: string,
): Promise<TechnologyEntry[]> {
  const manifest = await readJsonFile(manifestPath, 'manifest');
  if (!manifest || typeof manifest !== 'object' || Array.isArray(manifest)) {
    throw new ConfigurationError(`manifest at ${manifestPath} is not an object`);
  }

  const out: TechnologyEntry[] = [];
  for (const field of ['dependencies', 'devDependencies']) {
    const block: unknown = Reflect.get(manifest, field);
    if (!block || typeof block !== 'object' || Array.isArray(block)) {
      continue;
    }
    for (const [name, version] of Object.entries(block)) {
      out.push({
        name,
        description:
          typeof version === 'string' ? `version ${version}` : undefined,
      });
    }
  }
  return out;
}

function mergeTechnologies(
  primary: TechnologyEntry[],
  extra: TechnologyEntry[],
): TechnologyEntry[] {
  const seen = new Set(primary.map((entry) => entry.name.toLowerCase()));
  const merged = [...primary];
  for (const entry of extra) {
    const key = entry.name.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    merged.push(entry);
  }
  return merged;
}

function resolveThreshold(
  override: number | null,
  fromFile: number | undefined,
): number {
  const value = override ?? fromFile;
  if (value == null) {
    throw new ConfigurationError(
      'similarity threshold is required (VIGIL_SIMILARITY_THRESHOLD or analysis.similarityThreshold)',
    );
  }
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    throw new ConfigurationError(
      'similarity threshold must be a number between -1 and 1',
    );
  }
  return value;
}

async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${label} not readable at ${filePath}: ${message}`, {
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`${label} at ${filePath} is not valid JSON`, {
      cause: error,
    });
  }
}
