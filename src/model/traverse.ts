/**
 * Tree traversal helpers
 *
 * Children are owned by their parent; there are no back-references,
 * so walking is a plain depth-first recursion.
 */

import type { Block, DocumentNode } from './types.js';

/**
 * Child node lists of a container block, in document order
 */
export function childLists(block: Block): DocumentNode[][] {
  switch (block.kind) {
    case 'tabs':
      return block.panels.map(panel => panel.children);
    case 'columns':
      return block.columns.map(column => column.children);
    case 'site':
    case 'page':
      return [block.children];
    default:
      return [];
  }
}

export function childBlocks(block: Block): Block[] {
  const blocks: Block[] = [];
  for (const list of childLists(block)) {
    for (const node of list) {
      if (node.kind !== 'prose') blocks.push(node);
    }
  }
  return blocks;
}

/**
 * Containers count toward nesting depth; faq and pricing-table hold
 * structured items, not blocks, so they never have block children.
 */
export function isContainer(block: Block): boolean {
  return block.kind === 'tabs' || block.kind === 'columns' || block.kind === 'site' || block.kind === 'page';
}

export interface WalkContext {
  /** Enclosing block, or null at top level */
  parent: Block | null;
  /** 1 for top-level blocks */
  depth: number;
}

/**
 * Visit every block depth-first in document order
 */
export function walkBlocks(
  nodes: readonly DocumentNode[],
  visit: (block: Block, context: WalkContext) => void,
  parent: Block | null = null,
  depth = 1
): void {
  for (const node of nodes) {
    if (node.kind === 'prose') continue;
    visit(node, { parent, depth });
    for (const list of childLists(node)) {
      walkBlocks(list, visit, node, depth + 1);
    }
  }
}

export function findBlocks<K extends Block['kind']>(
  nodes: readonly DocumentNode[],
  kind: K
): Extract<Block, { kind: K }>[] {
  const found: Extract<Block, { kind: K }>[] = [];
  walkBlocks(nodes, block => {
    if (isKind(block, kind)) found.push(block);
  });
  return found;
}

export function isKind<K extends Block['kind']>(block: Block, kind: K): block is Extract<Block, { kind: K }> {
  return block.kind === kind;
}
