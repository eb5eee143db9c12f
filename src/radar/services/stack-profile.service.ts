import { Injectable, Logger } from '@nestjs/common';
import { ConfigurationEmptyError } from '../errors/radar.errors';
import {
  ProfileFacet,
  StackDeclaration,
  StackProfile,
  TechnologyEntry,
} from '../types/radar.types';
import { meanVector } from '../utils/similarity.util';
import { cleanText } from '../utils/text.util';
import { EmbeddingService } from './embedding.service';

export const PROJECT_CONTEXT_FACET = 'project-context';

/**
 * Builds the reference vectors an article is compared against. Every
 * technology gets its own description; members of a group are averaged into
 * one facet so a long dependency list cannot drown out a short one.
 */
@Injectable()
export class StackProfileService {
  private readonly logger = new Logger(StackProfileService.name);

  constructor(private readonly embeddingService: EmbeddingService) {}

  async build(stack: StackDeclaration): Promise<StackProfile> {
    const technologies = stack.technologies.filter((entry) =>
      cleanText(entry.name),
    );
    if (technologies.length === 0) {
      throw new ConfigurationEmptyError(
        'no technologies configured; nothing to filter against',
      );
    }

    const startedAt = Date.now();
    const facets: ProfileFacet[] = [];
    for (const [label, members] of this.groupTechnologies(technologies)) {
      const vectors: number[][] = [];
      for (const member of members) {
        vectors.push(await this.embeddingService.embed(describeTechnology(member)));
      }
      facets.push({
        label,
        technologies: members.map((member) => member.name),
        vector: meanVector(vectors),
      });
    }

    const context = cleanText(stack.context);
    if (context) {
      facets.push({
        label: PROJECT_CONTEXT_FACET,
        technologies: [],
        vector: await this.embeddingService.embed(`Project focus: ${context}`),
      });
    }

    this.logger.log(
      `stack profile built: technologies=${technologies.length} facets=${facets.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { facets };
  }

  private groupTechnologies(
    technologies: TechnologyEntry[],
  ): Map<string, TechnologyEntry[]> {
    const groups = new Map<string, TechnologyEntry[]>();
    for (const entry of technologies) {
      const label = cleanText(entry.group ?? '') || cleanText(entry.name);
      const members = groups.get(label) ?? [];
      members.push(entry);
      groups.set(label, members);
    }
    return groups;
  }
}

export function describeTechnology(entry: TechnologyEntry): string {
  const name = cleanText(entry.name);
  const description = cleanText(entry.description ?? '');
  const subject = description ? `${name} (${description})` : name;
  return `${subject}: releases, security advisories, vulnerabilities, deprecations and breaking changes affecting projects that use ${name}.`;
}
