/**
 * Idea lists written by the generate-ideas stage and read back by the bulk
 * command, which turns every entry into a project of its own.
 */

import { z } from 'zod';
import { formatIssues } from '../config.js';
import { PipelineError, errorMessage } from '../errors.js';
import { projectSlug } from '../artifacts/slug.js';

export const IdeaListEntrySchema = z.object({
  id: z.number().int().positive(),
  category: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1),
});

export const IdeaListSchema = z.object({
  ideas: z.array(IdeaListEntrySchema).min(1),
});

export type IdeaListEntry = z.infer<typeof IdeaListEntrySchema>;

export function parseIdeaList(raw: string, source = 'idea list'): IdeaListEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new PipelineError(`${source} is not valid JSON: ${errorMessage(error)}`, 'INVALID_IDEA_LIST', { cause: error });
  }

  const parsed = IdeaListSchema.safeParse(data);
  if (!parsed.success) {
    throw new PipelineError(`${source} does not match the idea list format: ${formatIssues(parsed.error)}`, 'INVALID_IDEA_LIST');
  }
  return parsed.data.ideas;
}

/** Project directory name for an entry, e.g. `3-meal-planner` */
export function ideaProjectName(entry: IdeaListEntry): string {
  return projectSlug(`${entry.id} ${entry.title}`);
}

/**
 * Idea text handed to expand-idea for an entry.
 */
export function ideaBrief(entry: IdeaListEntry): string {
  return `${entry.title} (${entry.category})\n\n${entry.description}`;
}
