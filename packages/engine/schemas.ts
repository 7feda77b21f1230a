import { z } from 'zod';
import { CAPABILITIES, GRANT_SCOPES, MODERATOR_STATES } from './types.js';

export const UserSchema = z.object({
  id: z.string().min(1),
  isSuperuser: z.boolean().default(false),
  isStaff: z.boolean().default(true),
});

export const CapabilitySchema = z.enum(CAPABILITIES);

export const GrantInputSchema = z
  .object({
    userId: z.string().min(1),
    nodeId: z.string().min(1).nullable(),
    capabilities: z.array(CapabilitySchema).default([]),
    moderate: z.boolean().default(false),
    scope: z.enum(GRANT_SCOPES).default('page_and_descendants'),
  })
  .refine(grant => !(grant.moderate && grant.nodeId === null), {
    message: 'global grants cannot moderate',
    path: ['moderate'],
  })
  .refine(grant => grant.moderate || grant.capabilities.length > 0, {
    message: 'grant must carry a capability or the moderate flag',
    path: ['capabilities'],
  });

export type GrantInput = z.input<typeof GrantInputSchema>;

export const NodeContentSchema = z.object({
  title: z.string().trim().min(1).max(255),
});

export const SignOffSchema = z.object({
  userId: z.string(),
  levelId: z.string().nullable(),
  signedAt: z.string(),
});

export const ModeratorStateSchema = z.enum(MODERATOR_STATES);

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
