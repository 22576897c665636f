/**
 * Immediate dominators of a graph whose nodes are numbered `0..n-1` with the
 * entry at 0 and every node reachable from it. Returns `idom` with
 * `idom[0] === 0`.
 *
 * Cooper, Harvey and Kennedy, "A Simple, Fast Dominance Algorithm": iterate
 * over reverse postorder, intersecting the dominators of processed
 * predecessors until nothing changes.
 */
export function immediateDominators(successors: readonly (readonly number[])[]): number[] {
  const count = successors.length;
  const postorder = postorderNumbers(successors);
  const predecessors: number[][] = Array.from({ length: count }, () => []);
  successors.forEach((targets, from) => {
    for (const to of targets) predecessors[to]?.push(from);
  });

  const order = Array.from({ length: count }, (_, i) => i).sort((a, b) => (postorder[b] ?? 0) - (postorder[a] ?? 0));
  const idom: number[] = new Array<number>(count).fill(-1);
  idom[0] = 0;

  const intersect = (left: number, right: number): number => {
    let a = left;
    let b = right;
    while (a !== b) {
      while ((postorder[a] ?? 0) < (postorder[b] ?? 0)) a = idom[a] ?? 0;
      while ((postorder[b] ?? 0) < (postorder[a] ?? 0)) b = idom[b] ?? 0;
    }
    return a;
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const node of order) {
      if (node === 0) continue;
      let candidate = -1;
      for (const pred of predecessors[node] ?? []) {
        if (idom[pred] === -1) continue;
        candidate = candidate === -1 ? pred : intersect(pred, candidate);
      }
      if (candidate !== -1 && idom[node] !== candidate) {
        idom[node] = candidate;
        changed = true;
      }
    }
  }
  return idom;
}

/** Postorder number of every node, from an iterative depth-first walk at 0. */
function postorderNumbers(successors: readonly (readonly number[])[]): number[] {
  const numbers: number[] = new Array<number>(successors.length).fill(-1);
  const visited = new Set<number>([0]);
  const stack: Array<{ node: number; next: number }> = [{ node: 0, next: 0 }];
  let counter = 0;
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (!top) break;
    const targets = successors[top.node] ?? [];
    if (top.next < targets.length) {
      const child = targets[top.next++];
      if (child !== undefined && !visited.has(child)) {
        visited.add(child);
        stack.push({ node: child, next: 0 });
      }
      continue;
    }
    numbers[top.node] = counter++;
    stack.pop();
  }
  return numbers;
}
