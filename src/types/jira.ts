import { z } from 'zod';

const namedSchema = z.object({ name: z.string() });

export const jiraIssueSchema = z.object({
  key: z.string().min(1),
  fields: z.object({
    summary: z.string(),
    description: z.unknown().optional(),
    status: namedSchema,
    priority: namedSchema.nullish(),
    issuetype: namedSchema.nullish(),
    created: z.string().nullish(),
    updated: z.string().nullish(),
  }),
});

export const jiraSearchResponseSchema = z.object({
  startAt: z.number().optional(),
  maxResults: z.number().optional(),
  total: z.number().optional(),
  issues: z.array(z.unknown()),
});

export type JiraIssue = z.infer<typeof jiraIssueSchema>;
