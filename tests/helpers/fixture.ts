import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { WorkflowOrchestrator, type WorkflowOptions } from '../../packages/engine/workflow.js';
import { createLogger } from '../../packages/engine/logger.js';
import { TreeNavigator } from '../../packages/engine/tree.js';
import { CAPABILITIES, GRANT_SCOPES, type Node, type PublicCounterpart } from '../../packages/engine/types.js';

const FixtureSchema = z.object({
  users: z.array(z.object({ id: z.string(), isSuperuser: z.boolean(), isStaff: z.boolean() })),
  pages: z.array(z.object({ key: z.string(), title: z.string(), parent: z.string().nullable() })),
  grants: z.array(
    z.object({
      user: z.string(),
      page: z.string().nullable(),
      capabilities: z.array(z.enum(CAPABILITIES)),
      moderate: z.boolean().default(false),
      scope: z.enum(GRANT_SCOPES).default('page_and_descendants'),
    }),
  ),
  publish: z.array(z.string()),
});

export type Fixture = z.infer<typeof FixtureSchema>;

export function readFixture(name: string): Fixture {
  const file = fileURLToPath(new URL(`../fixtures/${name}.json`, import.meta.url));
  return FixtureSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
}

export const silentLogger = createLogger({ logLevel: 'silent', logPretty: false });

export interface LoadedFixture {
  workflow: WorkflowOrchestrator;
  pageId(key: string): string;
  page(key: string): Node;
}

/**
 * Builds the fixture through the workflow itself, acting as `super`: pages in
 * order, then grants, then publication (approving where moderation asks).
 */
export function loadFixture(name: string, options: WorkflowOptions = {}): LoadedFixture {
  const fixture = readFixture(name);
  const workflow = new WorkflowOrchestrator({ logger: silentLogger, ...options });
  for (const user of fixture.users) {
    workflow.registerUser(user);
  }

  const ids = new Map<string, string>();
  const pageId = (key: string): string => {
    const id = ids.get(key);
    if (!id) throw new Error(`fixture page not loaded: ${key}`);
    return id;
  };

  for (const page of fixture.pages) {
    const parentId = page.parent === null ? null : pageId(page.parent);
    ids.set(page.key, workflow.createNode('super', parentId, { title: page.title }).id);
  }
  for (const grant of fixture.grants) {
    workflow.grantPermission('super', {
      userId: grant.user,
      nodeId: grant.page === null ? null : pageId(grant.page),
      capabilities: grant.capabilities,
      moderate: grant.moderate,
      scope: grant.scope,
    });
  }
  for (const key of fixture.publish) {
    const requested = workflow.requestPublish('super', pageId(key));
    if (requested.moderatorState === 'NEED_APPROVEMENT') {
      workflow.approve('super', requested.id);
    }
  }

  return { workflow, pageId, page: (key: string) => workflow.getNode(pageId(key)) };
}

export function structuralAttributes(workflow: WorkflowOrchestrator, nodeId: string) {
  const position = new TreeNavigator(workflow.store).positions().get(nodeId);
  if (!position) throw new Error(`no tree position for ${nodeId}`);
  return { id: nodeId, ...position };
}

export function publicAttributes(counterpart: PublicCounterpart) {
  return {
    id: counterpart.id,
    treeId: counterpart.treeId,
    lft: counterpart.lft,
    rght: counterpart.rght,
    parentId: counterpart.parentId,
    level: counterpart.level,
  };
}
