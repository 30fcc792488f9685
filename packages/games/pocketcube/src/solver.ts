import { CubeState, SOLVED_STATE, isSolvedState, stateKey } from "./state";
import { MoveName, MOVE_LIST, applyPermutation } from "./moves";

/** Depth used when the caller gives none: fast, but misses long solutions */
export const DEFAULT_MAX_DEPTH = 8;

/** Depth at which every reachable position has a solution (God's number, all face turns) */
export const OPTIMAL_MAX_DEPTH = 11;

export interface SearchResult {
  /** Shortest move sequence found, or null if none exists within maxDepth */
  solution: MoveName[] | null;
  /** Nodes taken off the frontier and expanded */
  expanded: number;
  /** Distinct states seen, including the start */
  visited: number;
}

interface SearchNode {
  state: CubeState;
  depth: number;
  /** How this node was reached; null for the start node */
  via: { move: MoveName; parent: SearchNode } | null;
}

const SOLVED_KEY = stateKey(SOLVED_STATE);

function pathTo(node: SearchNode, lastMove: MoveName): MoveName[] {
  const moves: MoveName[] = [lastMove];
  for (let step = node.via; step !== null; step = step.parent.via) {
    moves.push(step.move);
  }
  return moves.reverse();
}

/**
 * Breadth-first search from `start` to the solved cube, expanding each node
 * with every move in MOVE_ORDER. Nodes at maxDepth are not expanded. The
 * first solution found is a shortest one; ties go to the earliest move order.
 */
export function searchSolution(start: CubeState, maxDepth: number): SearchResult {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  if (isSolvedState(start)) {
    return { solution: [], expanded: 0, visited: 1 };
  }

  const frontier: SearchNode[] = [{ state: start, depth: 0, via: null }];
  const visited = new Set<string>([stateKey(start)]);
  let head = 0;
  let expanded = 0;

  while (head < frontier.length) {
    const node = frontier[head++];
    if (node.depth >= maxDepth) continue;
    expanded++;

    for (const move of MOVE_LIST) {
      const next = applyPermutation(node.state, move.permutation);
      const key = stateKey(next);

      if (key === SOLVED_KEY) {
        return { solution: pathTo(node, move.name), expanded, visited: visited.size };
      }

      if (!visited.has(key)) {
        visited.add(key);
        frontier.push({
          state: next,
          depth: node.depth + 1,
          via: { move: move.name, parent: node },
        });
      }
    }
  }

  return { solution: null, expanded, visited: visited.size };
}

/**
 * Shortest solution of at most `maxDepth` moves, `[]` for a solved cube,
 * or null when the bound is exhausted. Null does not mean the cube is
 * unsolvable, only that no solution is that short.
 */
export function solveCube(start: CubeState, maxDepth: number = DEFAULT_MAX_DEPTH): MoveName[] | null {
  return searchSolution(start, maxDepth).solution;
}
