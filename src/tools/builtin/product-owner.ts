/**
 * Product owner agent tools
 */

import { z } from 'zod';
import type { ToolRegistry } from '../registry.js';

export const PRODUCT_OWNER_AGENT = 'po';

export const GenerateUserStoryArgs = z.object({
  feature_description: z.string().min(1),
  user_persona: z.string().min(1),
  acceptance_criteria_count: z.number().int().min(1).max(10).default(3),
  include_estimation: z.boolean().default(false),
});

export function generateUserStory(args: z.output<typeof GenerateUserStoryArgs>) {
  return {
    feature: args.feature_description,
    persona: args.user_persona,
    user_story: `As a ${args.user_persona}, I want to ${args.feature_description}`,
    acceptance_criteria: Array.from({ length: args.acceptance_criteria_count }, (_, i) => `AC ${i + 1}`),
    story_points: args.include_estimation ? 5 : null,
    status: 'generated',
  };
}

export const BacklogItem = z
  .object({
    name: z.string().optional(),
    impact: z.number().optional(),
  })
  .passthrough();

type BacklogEntry = z.output<typeof BacklogItem>;

export const PrioritizationArgs = z.object({
  items: z.array(BacklogItem),
  method: z.enum(['rice', 'moscow', 'value_effort', 'kano']).default('rice'),
});

type Bucket = 'must_have' | 'should_have' | 'could_have' | 'wont_have';

/**
 * MoSCoW bucket for an impact score on a 0-10 scale
 */
export function bucketFor(impact: number): Bucket {
  if (impact >= 8) return 'must_have';
  if (impact >= 5) return 'should_have';
  if (impact >= 2) return 'could_have';
  return 'wont_have';
}

/**
 * Items ordered by impact, highest first. Items without an impact count as 0
 * and ties keep their input order.
 */
export function createPrioritizationMatrix(args: z.output<typeof PrioritizationArgs>) {
  const prioritized = [...args.items].sort((a, b) => (b.impact ?? 0) - (a.impact ?? 0));
  const buckets: Record<Bucket, BacklogEntry[]> = {
    must_have: [],
    should_have: [],
    could_have: [],
    wont_have: [],
  };
  for (const item of prioritized) {
    buckets[bucketFor(item.impact ?? 0)].push(item);
  }
  return {
    method: args.method,
    total_items: args.items.length,
    prioritized_items: prioritized,
    ...buckets,
  };
}

export const SprintStory = z
  .object({
    title: z.string().optional(),
    story_points: z.number().nonnegative().optional(),
  })
  .passthrough();

export const PlanSprintArgs = z.object({
  sprint_name: z.string().min(1),
  duration_days: z.number().int().min(1),
  team_capacity: z.number().positive(),
  user_stories: z.array(SprintStory),
});

export function planSprint(args: z.output<typeof PlanSprintArgs>) {
  const totalPoints = args.user_stories.reduce((sum, story) => sum + (story.story_points ?? 0), 0);
  return {
    sprint: args.sprint_name,
    duration_days: args.duration_days,
    team_capacity: args.team_capacity,
    planned_stories: args.user_stories,
    total_story_points: totalPoints,
    capacity_used: `${((totalPoints / args.team_capacity) * 100).toFixed(1)}%`,
    over_capacity: totalPoints > args.team_capacity,
    status: 'planned',
  };
}

export function registerProductOwnerTools(registry: ToolRegistry, agent: string = PRODUCT_OWNER_AGENT): void {
  registry.registerTyped(agent, 'generate_user_story', GenerateUserStoryArgs, generateUserStory);
  registry.registerTyped(agent, 'create_prioritization_matrix', PrioritizationArgs, createPrioritizationMatrix);
  registry.registerTyped(agent, 'plan_sprint', PlanSprintArgs, planSprint);
}
