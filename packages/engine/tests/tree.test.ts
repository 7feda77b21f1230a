import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidStateTransition, NotFound } from '../errors.js';
import { MemoryStore } from '../store/memory.js';
import { TreeNavigator } from '../tree.js';
import { makeNode, seedTree } from './builders.js';

describe('TreeNavigator', () => {
  let store: MemoryStore;
  let tree: TreeNavigator;

  beforeEach(() => {
    store = new MemoryStore();
    seedTree(store, [
      ['home', null],
      ['about', 'home'],
      ['team', 'about'],
      ['news', 'home'],
    ]);
    tree = new TreeNavigator(store);
  });

  it('lists ancestors root first', () => {
    expect(tree.ancestors(tree.get('team')).map(node => node.id)).toEqual(['home', 'about']);
    expect(tree.ancestors(tree.get('home'))).toEqual([]);
    expect(tree.depth(tree.get('team'))).toBe(2);
  });

  it('walks descendants in pre-order', () => {
    expect(tree.descendants(tree.get('home')).map(node => node.id)).toEqual(['about', 'team', 'news']);
  });

  it('answers descendant checks', () => {
    expect(tree.isDescendantOf(tree.get('team'), tree.get('home'))).toBe(true);
    expect(tree.isDescendantOf(tree.get('home'), tree.get('team'))).toBe(false);
    expect(tree.isDescendantOf(tree.get('news'), tree.get('about'))).toBe(false);
  });

  it('throws NotFound for an unknown id', () => {
    expect(() => tree.get('missing')).toThrow(NotFound);
  });

  it('sees writes made after it was built', () => {
    store.putNode(makeNode('late', null, { treeId: 2 }));
    expect(tree.roots().map(node => node.id)).toEqual(['home', 'late']);
  });

  it('numbers each tree as a nested set', () => {
    store.putNode(makeNode('other', null, { treeId: 2 }));
    const positions = tree.positions();

    expect(positions.get('home')).toEqual({ treeId: 1, lft: 1, rght: 8, level: 0, parentId: null });
    expect(positions.get('about')).toEqual({ treeId: 1, lft: 2, rght: 5, level: 1, parentId: 'home' });
    expect(positions.get('team')).toEqual({ treeId: 1, lft: 3, rght: 4, level: 2, parentId: 'about' });
    expect(positions.get('news')).toEqual({ treeId: 1, lft: 6, rght: 7, level: 1, parentId: 'home' });
    expect(positions.get('other')).toEqual({ treeId: 2, lft: 1, rght: 2, level: 0, parentId: null });
  });

  it('detects a cycle in the ancestor chain', () => {
    const home = tree.get('home');
    home.parentId = 'team';
    store.putNode(home);

    expect(() => tree.ancestors(tree.get('about'))).toThrow(InvalidStateTransition);
  });

  it('detects a cycle below a node', () => {
    const team = tree.get('team');
    team.childIds = ['about'];
    store.putNode(team);

    expect(() => tree.descendants(tree.get('about'))).toThrow(InvalidStateTransition);
  });
});
