import { beforeEach, describe, expect, it } from 'vitest';
import { PermissionDenied } from '../packages/engine/errors.js';
import type { WorkflowOrchestrator } from '../packages/engine/workflow.js';
import { loadFixture, publicAttributes, structuralAttributes, type LoadedFixture } from './helpers/fixture.js';

let pageCounter = 0;

function createPage(workflow: WorkflowOrchestrator, actor: string, parentId: string | null) {
  pageCounter += 1;
  const page = workflow.createNode(actor, parentId, { title: `test-page-${pageCounter}` }, { position: 'first-child' });
  // moderation keeps new pages out of the public tree
  expect(workflow.getPublic(page.id)).toBeNull();
  return page;
}

function publishPage(workflow: WorkflowOrchestrator, actor: string, pageId: string, approve: boolean, publishedCheck = true) {
  const requested = workflow.requestPublish(actor, pageId);
  if (!approve) {
    return requested;
  }
  const page = workflow.approve(actor, pageId);
  if (publishedCheck) {
    const counterpart = workflow.getPublic(page.id);
    expect(counterpart).not.toBeNull();
    expect(counterpart?.published).toBe(true);
  }
  return page;
}

function checkPublishedAttributes(workflow: WorkflowOrchestrator, pageId: string) {
  const counterpart = workflow.getPublic(pageId);
  expect(counterpart).not.toBeNull();
  if (!counterpart) return;
  expect(publicAttributes(counterpart)).toEqual(structuralAttributes(workflow, pageId));
}

describe('permissions and moderation together', () => {
  let fx: LoadedFixture;

  beforeEach(() => {
    fx = loadFixture('permission');
  });

  it('loads the fixture in the expected moderation states', () => {
    expect(fx.page('home').moderatorState).toBe('APPROVED');
    expect(fx.workflow.getPublic(fx.pageId('home'))).not.toBeNull();
    expect(fx.page('master').moderatorState).toBe('CHANGED');
    expect(fx.page('slave-home').moderatorState).toBe('APPROVED_WAITING_FOR_PARENTS');
    expect(fx.workflow.getPublic(fx.pageId('slave-home'))).toBeNull();
  });

  it('lets the superuser add a page to the root', () => {
    const page = fx.workflow.createNode('super', null, { title: 'root page' });
    expect(page.parentId).toBeNull();
  });

  it('refuses master a page at the root', () => {
    expect(() => fx.workflow.createNode('master', null, { title: 'nope' })).toThrow(PermissionDenied);
  });

  it('refuses slave a page at the root', () => {
    expect(() => fx.workflow.createNode('slave', null, { title: 'nope' })).toThrow(PermissionDenied);
  });

  it('counts one moderator on slave-home', () => {
    expect(fx.workflow.moderatorCount(fx.pageId('slave-home'))).toBe(1);
  });

  it('lets slave add a page under slave-home that master then approves', () => {
    const page = createPage(fx.workflow, 'slave', fx.pageId('slave-home'));
    expect(fx.workflow.moderatorCount(page.id)).toBe(1);
    expect(page.publicId).toBeNull();

    const requested = fx.workflow.requestPublish('master', page.id);
    expect(requested.moderatorState).toBe('NEED_APPROVEMENT');

    const approved = fx.workflow.approve('master', page.id);
    // slave-home is still waiting for master, so the page waits too
    expect(approved.moderatorState).toBe('APPROVED_WAITING_FOR_PARENTS');
    expect(fx.workflow.getPublic(page.id)).toBeNull();
  });

  it('keeps public attributes equal when pages are approved in reverse order', () => {
    const ids: string[] = [];
    for (let i = 0; i < 10; i++) {
      ids.push(createPage(fx.workflow, 'master', fx.pageId('home')).id);
    }

    for (const id of ids.slice(5).reverse()) {
      const page = publishPage(fx.workflow, 'master', id, true);
      expect(page.moderatorState).toBe('APPROVED');
      checkPublishedAttributes(fx.workflow, id);
    }
    for (const id of ids.slice(5)) {
      checkPublishedAttributes(fx.workflow, id);
    }
  });

  it('publishes a copy made from an unpublished page', () => {
    const page = createPage(fx.workflow, 'master', fx.pageId('slave-home'));
    const copy = fx.workflow.copySubtree('master', page.id, fx.pageId('home'), { position: 'first-child' });
    expect(copy.parentId).toBe(fx.pageId('home'));

    const published = publishPage(fx.workflow, 'master', copy.id, true);
    expect(published.moderatorState).toBe('APPROVED');
    checkPublishedAttributes(fx.workflow, copy.id);
  });

  it('copies a published page as an unpublished one', () => {
    const page = createPage(fx.workflow, 'master', fx.pageId('home'));
    publishPage(fx.workflow, 'master', page.id, true);

    const copy = fx.workflow.copySubtree('master', page.id, fx.pageId('master'), { position: 'first-child' });

    expect(copy.moderatorState).toBe('CHANGED');
    expect(fx.workflow.getPublic(copy.id)).toBeNull();
    expect(fx.workflow.getNode(page.id).moderatorState).toBe('APPROVED');
    checkPublishedAttributes(fx.workflow, page.id);
  });

  it('publishes a waiting subpage once its parent is published', () => {
    const page = createPage(fx.workflow, 'master', fx.pageId('home'));
    const subpage = createPage(fx.workflow, 'master', page.id);

    const waiting = publishPage(fx.workflow, 'master', subpage.id, true, false);
    expect(fx.workflow.getPublic(subpage.id)).toBeNull();
    expect(waiting.moderatorState).toBe('APPROVED_WAITING_FOR_PARENTS');

    publishPage(fx.workflow, 'master', page.id, true);
    expect(fx.workflow.getPublic(page.id)).not.toBeNull();

    const reloaded = fx.workflow.getNode(subpage.id);
    expect(reloaded.moderatorState).toBe('APPROVED');
    expect(fx.workflow.getPublic(subpage.id)).not.toBeNull();

    checkPublishedAttributes(fx.workflow, page.id);
    checkPublishedAttributes(fx.workflow, subpage.id);
  });

  it('lets the superuser publish a root page and then its subpage', () => {
    const page = createPage(fx.workflow, 'super', null);
    const subpage = createPage(fx.workflow, 'super', page.id);

    publishPage(fx.workflow, 'super', page.id, true);
    publishPage(fx.workflow, 'super', subpage.id, true);

    checkPublishedAttributes(fx.workflow, page.id);
    checkPublishedAttributes(fx.workflow, subpage.id);
  });

  it('leaves a new unmoderated root page CHANGED and private', () => {
    const page = createPage(fx.workflow, 'super', null);
    expect(page.moderatorState).toBe('CHANGED');
    expect(page.publicId).toBeNull();
  });

  it('moves moderation flags through request, approval and parent publication', () => {
    const page = createPage(fx.workflow, 'slave', fx.pageId('slave-home'));
    expect(page.moderatorState).toBe('CHANGED');

    const requested = publishPage(fx.workflow, 'slave', page.id, false);
    expect(requested.moderatorState).toBe('NEED_APPROVEMENT');

    const approved = fx.workflow.approve('master', page.id);
    expect(fx.workflow.getPublic(page.id)).toBeNull();
    expect(approved.moderatorState).toBe('APPROVED_WAITING_FOR_PARENTS');

    const master = publishPage(fx.workflow, 'master', fx.pageId('master'), false);
    expect(master.moderatorState).toBe('APPROVED');

    expect(fx.page('slave-home').moderatorState).toBe('APPROVED');
    expect(fx.workflow.getNode(page.id).moderatorState).toBe('APPROVED');
    checkPublishedAttributes(fx.workflow, page.id);
  });

  it('stops slave from approving its own page', () => {
    const page = createPage(fx.workflow, 'slave', fx.pageId('slave-home'));
    fx.workflow.requestPublish('slave', page.id);
    expect(() => fx.workflow.approve('slave', page.id)).toThrow(PermissionDenied);
    expect(fx.workflow.getNode(page.id).moderatorState).toBe('NEED_APPROVEMENT');
  });

  it('lets master add under home but not change home itself', () => {
    expect(fx.workflow.canPerform('master', fx.pageId('home'), 'change')).toBe(false);
    expect(() => fx.workflow.requestPublish('master', fx.pageId('home'))).toThrow(PermissionDenied);
    expect(createPage(fx.workflow, 'master', fx.pageId('home')).parentId).toBe(fx.pageId('home'));
  });

  it('applies the nearest grant on pageA over the one on home', () => {
    expect(fx.workflow.canPerform('master', fx.pageId('pageA'), 'change')).toBe(true);
    expect(fx.workflow.canPerform('master', fx.pageId('pageA'), 'publish')).toBe(false);
    expect(fx.workflow.canPerform('master', fx.pageId('master'), 'publish')).toBe(true);
  });
});
