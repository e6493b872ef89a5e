import type { FilterNode, FilterRecord } from '../types/TimeSeries';

/**
 * Build the filter forest from flat {id, name, parentId} records.
 *
 * Records whose parentId equals rootParent form the top level; children keep
 * their input order. A record whose parent chain never reaches rootParent is
 * not reachable and is left out. An id already on the current branch is not
 * descended into again, so repeated ids cannot recurse forever.
 */
export function buildTree(records: FilterRecord[], rootParent: string | null): FilterNode[] {
  const childrenByParent = new Map<string | null, FilterRecord[]>();
  for (const record of records) {
    const siblings = childrenByParent.get(record.parentId);
    if (siblings) {
      siblings.push(record);
    } else {
      childrenByParent.set(record.parentId, [record]);
    }
  }

  const build = (parentId: string | null, ancestors: Set<string>): FilterNode[] => {
    const nodes: FilterNode[] = [];
    for (const record of childrenByParent.get(parentId) ?? []) {
      if (ancestors.has(record.id)) {
        continue;
      }
      ancestors.add(record.id);
      const childNodes = build(record.id, ancestors);
      ancestors.delete(record.id);

      nodes.push({
        id: record.id,
        name: record.name,
        childNodes,
        isLeaf: childNodes.length === 0,
      });
    }
    return nodes;
  };

  return build(rootParent, new Set());
}

/**
 * Depth-first walk over a forest, parents before children
 */
export function* walkTree(nodes: FilterNode[]): Generator<FilterNode> {
  for (const node of nodes) {
    yield node;
    yield* walkTree(node.childNodes);
  }
}
