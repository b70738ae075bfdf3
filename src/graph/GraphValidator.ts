/**
 * Load-time checks. Everything that would make evaluation impossible is
 * rejected here with a GraphConfigError, so evaluate() only meets resource
 * and device failures.
 */

import type { OperatorNode, Subroutine, TexturePackage } from "../types";
import { PARAMETER_BYTES, MAX_PARENTS } from "../types";
import type { FilterRegistry } from "../filters/FilterRegistry";
import { GraphConfigError } from "../engine/EngineErrors";

export interface ValidationLimits {
  maxNodes: number;
  maxSubroutineDepth: number;
}

export function validatePackage(
  pkg: TexturePackage,
  registry: FilterRegistry,
  limits: ValidationLimits,
): void {
  validateNodes(pkg.nodes, "graph", pkg.subroutines.length, registry, limits);

  for (const output of pkg.outputs) {
    if (!isIndex(output, pkg.nodes.length)) {
      throw new GraphConfigError("parent-range", `graph: output ${output} is outside 0-${pkg.nodes.length - 1}`);
    }
  }

  pkg.subroutines.forEach((sub, i) => {
    const label = `subroutine ${i}${sub.name ? ` (${sub.name})` : ""}`;
    validateNodes(sub.nodes, label, pkg.subroutines.length, registry, limits);
    validateSubroutineInterface(sub, label);
  });

  validateSubroutineCalls(pkg, limits.maxSubroutineDepth);
}

function validateNodes(
  nodes: OperatorNode[],
  label: string,
  subroutineCount: number,
  registry: FilterRegistry,
  limits: ValidationLimits,
): void {
  if (nodes.length > limits.maxNodes) {
    throw new GraphConfigError("capacity", `${label}: ${nodes.length} nodes exceed the limit of ${limits.maxNodes}`);
  }

  nodes.forEach((node, index) => {
    const where = `${label}, node ${index}`;

    if (node.kind === "subroutine") {
      if (!isIndex(node.filterId, subroutineCount)) {
        throw new GraphConfigError("subroutine-index", `${where}: calls missing subroutine ${node.filterId}`);
      }
    } else if (!registry.has(node.filterId)) {
      throw new GraphConfigError("filter-range", `${where}: filter id ${node.filterId} is not registered`);
    }

    if (node.parameters.length !== PARAMETER_BYTES) {
      throw new GraphConfigError("malformed", `${where}: expected ${PARAMETER_BYTES} parameter bytes, got ${node.parameters.length}`);
    }
    if (node.parents.length !== MAX_PARENTS) {
      throw new GraphConfigError("malformed", `${where}: expected ${MAX_PARENTS} parent slots`);
    }
    for (const parent of node.parents) {
      if (parent !== null && !isIndex(parent, nodes.length)) {
        throw new GraphConfigError("parent-range", `${where}: parent ${parent} is outside 0-${nodes.length - 1}`);
      }
    }
  });

  assertAcyclic(nodes, label);
}

/**
 * Depth-first search with a visiting set; a back edge is a cycle.
 * Iterative so that long chains cannot overflow the call stack.
 */
function assertAcyclic(nodes: OperatorNode[], label: string): void {
  const UNVISITED = 0;
  const VISITING = 1;
  const DONE = 2;
  const state = new Uint8Array(nodes.length);

  for (let start = 0; start < nodes.length; start++) {
    if (state[start] !== UNVISITED) continue;

    const stack: { index: number; slot: number }[] = [{ index: start, slot: 0 }];
    state[start] = VISITING;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.slot >= MAX_PARENTS) {
        state[frame.index] = DONE;
        stack.pop();
        continue;
      }

      const parent = nodes[frame.index].parents[frame.slot++];
      if (parent === null) continue;
      if (state[parent] === VISITING) {
        throw new GraphConfigError("cycle", `${label}: node ${parent} is its own ancestor (via node ${frame.index})`);
      }
      if (state[parent] === UNVISITED) {
        state[parent] = VISITING;
        stack.push({ index: parent, slot: 0 });
      }
    }
  }
}

function validateSubroutineInterface(sub: Subroutine, label: string): void {
  const count = sub.nodes.length;
  if (!isIndex(sub.outputIndex, count)) {
    throw new GraphConfigError("subroutine-index", `${label}: output ${sub.outputIndex} is outside 0-${count - 1}`);
  }

  if (sub.inputIndices.length > MAX_PARENTS) {
    throw new GraphConfigError("subroutine-index", `${label}: ${sub.inputIndices.length} inputs exceed ${MAX_PARENTS}`);
  }
  for (const input of sub.inputIndices) {
    if (!isIndex(input, count)) {
      throw new GraphConfigError("subroutine-index", `${label}: input ${input} is outside 0-${count - 1}`);
    }
    // The output is handed to the caller; a pre-seeded buffer belongs to the caller already
    if (input === sub.outputIndex) {
      throw new GraphConfigError("subroutine-index", `${label}: input ${input} is also the output`);
    }
  }
  if (new Set(sub.inputIndices).size !== sub.inputIndices.length) {
    throw new GraphConfigError("subroutine-index", `${label}: duplicate input indices`);
  }

  if (sub.overrides.length > PARAMETER_BYTES) {
    throw new GraphConfigError("subroutine-index", `${label}: ${sub.overrides.length} overrides exceed ${PARAMETER_BYTES} parameter bytes`);
  }
  for (const override of sub.overrides) {
    if (!isIndex(override.node, count)) {
      throw new GraphConfigError("subroutine-index", `${label}: override targets missing node ${override.node}`);
    }
    if (!isIndex(override.slot, PARAMETER_BYTES)) {
      throw new GraphConfigError("subroutine-index", `${label}: override slot ${override.slot} is outside 0-${PARAMETER_BYTES - 1}`);
    }
  }
}

/**
 * Subroutines may call each other but not recursively, and the deepest call
 * chain from the top-level graph must fit in maxDepth.
 */
function validateSubroutineCalls(pkg: TexturePackage, maxDepth: number): void {
  const calls = pkg.subroutines.map((sub) => calledSubroutines(sub.nodes));
  const depth = new Map<number, number>();
  const visiting = new Set<number>();

  const depthOf = (index: number): number => {
    const known = depth.get(index);
    if (known !== undefined) return known;
    if (visiting.has(index)) {
      throw new GraphConfigError("subroutine-recursion", `subroutine ${index} calls itself`);
    }
    visiting.add(index);
    let deepest = 0;
    for (const callee of calls[index]) deepest = Math.max(deepest, depthOf(callee));
    visiting.delete(index);
    depth.set(index, deepest + 1);
    return deepest + 1;
  };

  for (const callee of calledSubroutines(pkg.nodes)) {
    const chain = depthOf(callee);
    if (chain > maxDepth) {
      throw new GraphConfigError("subroutine-recursion", `subroutine calls nest ${chain} deep, limit is ${maxDepth}`);
    }
  }
  // Unreachable subroutines still must not recurse
  for (let i = 0; i < pkg.subroutines.length; i++) depthOf(i);
}

function calledSubroutines(nodes: OperatorNode[]): Set<number> {
  const called = new Set<number>();
  for (const node of nodes) {
    if (node.kind === "subroutine") called.add(node.filterId);
  }
  return called;
}

function isIndex(n: number, length: number): boolean {
  return Number.isInteger(n) && n >= 0 && n < length;
}
