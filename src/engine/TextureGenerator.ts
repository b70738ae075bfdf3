import type { NodeIndex, TexturePackage } from "../types";
import { MAX_PARENTS } from "../types";
import type { PooledBuffer } from "../pool/ResourcePool";
import type { TextureContext } from "./TextureContext";
import type { ParentBuffers } from "./MultiPassRenderer";
import { renderPasses } from "./MultiPassRenderer";
import { SubroutineInvoker } from "./SubroutineInvoker";
import { validatePackage } from "../graph/GraphValidator";
import { resolutionKey } from "../graph/Resolution";
import { DeviceLostError, EvaluationAbortedError, GraphConfigError } from "./EngineErrors";

/** A node waiting for its parents during evaluation. */
interface EvaluationFrame {
  index: NodeIndex;
  /** Next parent slot to resolve. */
  slot: number;
  inputs: [PooledBuffer | null, PooledBuffer | null, PooledBuffer | null];
}

export interface EvaluateOptions {
  /** Checked before every node renders; evaluation stops with EvaluationAbortedError. */
  signal?: AbortSignal;
}

/**
 * One evaluation session over a node array.
 *
 * Results are memoized per node. Within a request, every uncached node's
 * consumers are counted first; once the last one has rendered, a non-persist
 * intermediate goes back to the pool and its memo slot is cleared, so asking
 * for it again re-renders it. Requested roots and persist nodes stay resident
 * until invalidate() or reset().
 *
 * Slots filled by preseed() belong to whoever injected them and are never
 * released here.
 */
export class TextureGenerator {
  readonly context: TextureContext;
  readonly scope: TexturePackage;
  /** Subroutine nesting level, 0 for a top-level graph. */
  readonly depth: number;

  private cache: (PooledBuffer | null)[];
  private external: boolean[];
  private pending: Int32Array;
  private pinned = new Set<NodeIndex>();
  private requested = new Set<NodeIndex>();
  private invoker = new SubroutineInvoker();
  private evaluations = 0;

  /**
   * A top-level generator validates its package against the context's
   * registry and limits. Nested generators run copies of already validated
   * subroutines.
   */
  constructor(context: TextureContext, scope: TexturePackage, depth = 0) {
    if (depth === 0) validatePackage(scope, context.registry, context.settings);
    this.context = context;
    this.scope = scope;
    this.depth = depth;

    const count = scope.nodes.length;
    this.cache = new Array<PooledBuffer | null>(count).fill(null);
    this.external = new Array<boolean>(count).fill(false);
    this.pending = new Int32Array(count);
  }

  /** Render a node, or return its memoized result. */
  evaluate(index: NodeIndex, options: EvaluateOptions = {}): PooledBuffer {
    const [result] = this.evaluateRoots([index], options);
    return result;
  }

  /** Render every declared output of the package, sharing common ancestors. */
  evaluateOutputs(options: EvaluateOptions = {}): PooledBuffer[] {
    return this.evaluateRoots(this.scope.outputs, options);
  }

  getCached(index: NodeIndex): PooledBuffer | null {
    return this.cache[index] ?? null;
  }

  /**
   * Fill a slot with a buffer evaluated elsewhere. The node will not render;
   * its consumers read this buffer instead.
   */
  preseed(index: NodeIndex, buffer: PooledBuffer): void {
    this.assertIndex(index);
    this.cache[index] = buffer;
    this.external[index] = true;
  }

  /** Empty every pre-seeded slot without releasing the buffers. */
  clearPreseeded(): void {
    for (let i = 0; i < this.external.length; i++) {
      if (!this.external[i]) continue;
      this.external[i] = false;
      this.cache[i] = null;
    }
  }

  /**
   * Drop the memoized result of a node and of everything downstream of it.
   * Results a caller may still hold (requested roots, persist nodes) are
   * retired: never handed out again, destroyed by ResourcePool.collect().
   */
  invalidate(index: NodeIndex): void {
    this.assertIndex(index);
    const stale = this.descendantsOf(index);
    for (const i of stale) this.drop(i);
    if (this.context.settings.debug) {
      console.debug(`[TextureGenerator] invalidated ${stale.size} node(s) from ${index}`);
    }
  }

  /** Drop every memoized result. */
  reset(): void {
    this.clearPreseeded();
    for (let i = 0; i < this.cache.length; i++) this.drop(i);
    this.pinned.clear();
  }

  /**
   * Release every buffer this session owns except the one at `keep`.
   * Retained roots and persist results are released too.
   */
  releaseAllExcept(keep: NodeIndex | null): void {
    for (let i = 0; i < this.cache.length; i++) {
      const buffer = this.cache[i];
      if (!buffer || i === keep || this.external[i]) continue;
      this.context.pool.release(buffer);
      this.cache[i] = null;
      this.pinned.delete(i);
    }
  }

  /** A session for a subroutine body, one nesting level deeper. */
  createNested(scope: TexturePackage): TextureGenerator {
    const depth = this.depth + 1;
    if (depth > this.context.settings.maxSubroutineDepth) {
      throw new GraphConfigError(
        "subroutine-recursion",
        `Subroutine nesting depth ${depth} exceeds ${this.context.settings.maxSubroutineDepth}`,
      );
    }
    return new TextureGenerator(this.context, scope, depth);
  }

  /** Filter renders performed by this session (subroutine bodies count in their own). */
  get evaluationCount(): number {
    return this.evaluations;
  }

  private evaluateRoots(roots: readonly NodeIndex[], options: EvaluateOptions): PooledBuffer[] {
    for (const root of roots) this.assertIndex(root);

    try {
      this.countConsumers(roots);
      for (const root of roots) this.requested.add(root);
      const results = roots.map((root) => this.evaluateNode(root, options.signal));
      for (const root of roots) this.pinned.add(root);
      return results;
    } catch (e) {
      this.discardIntermediates();
      throw e;
    } finally {
      this.requested.clear();
    }
  }

  /** Count, per parent slot, how many uncached nodes below the roots will read each node. */
  private countConsumers(roots: readonly NodeIndex[]): void {
    this.pending.fill(0);
    const visited = new Set<NodeIndex>();
    const stack = [...roots];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      if (visited.has(index) || this.cache[index]) continue;
      visited.add(index);
      for (const parent of this.scope.nodes[index].parents) {
        if (parent === null) continue;
        this.pending[parent]++;
        stack.push(parent);
      }
    }
  }

  /**
   * Post-order walk with an explicit stack, so chain length is bounded by
   * maxNodes rather than by the call stack. Each frame collects its parents'
   * buffers slot by slot and renders once all three are resolved.
   */
  private evaluateNode(root: NodeIndex, signal: AbortSignal | undefined): PooledBuffer {
    const cached = this.cache[root];
    if (cached) return cached;

    const stack: EvaluationFrame[] = [{ index: root, slot: 0, inputs: [null, null, null] }];
    for (;;) {
      const frame = stack[stack.length - 1];
      if (frame.slot < MAX_PARENTS) {
        const slot = frame.slot++;
        const parent = this.scope.nodes[frame.index].parents[slot];
        if (parent === null) continue;
        const ready = this.cache[parent];
        if (ready) {
          frame.inputs[slot] = ready;
        } else {
          stack.push({ index: parent, slot: 0, inputs: [null, null, null] });
        }
        continue;
      }

      stack.pop();
      const result = this.renderNode(frame.index, frame.inputs, signal);
      if (stack.length === 0) return result;
      const consumer = stack[stack.length - 1];
      consumer.inputs[consumer.slot - 1] = result;
    }
  }

  private renderNode(index: NodeIndex, parents: ParentBuffers, signal: AbortSignal | undefined): PooledBuffer {
    const { device, pool, registry, settings } = this.context;
    const node = this.scope.nodes[index];

    // Checked once the inputs are ready, right before this node renders
    if (device.isLost()) throw new DeviceLostError(`${device.name} device lost before node ${index}`);
    if (signal?.aborted) throw new EvaluationAbortedError(index);

    let result: PooledBuffer;
    if (node.kind === "subroutine") {
      const subroutine = this.scope.subroutines[node.filterId];
      if (settings.debug) {
        console.debug(`[TextureGenerator] node ${index}: subroutine ${node.filterId} at ${resolutionKey(node.resolution)}`);
      }
      result = this.invoker.invoke(subroutine, this, parents, node.parameters, node.resolution);
    } else {
      const filter = registry.getFilter(node.filterId);
      const precision = node.hdr ? "extended" : "standard";
      if (settings.debug) {
        console.debug(`[TextureGenerator] node ${index}: ${filter.name} at ${resolutionKey(node.resolution)} ${precision}`);
      }

      const primary = pool.acquire(node.resolution, precision);
      let pingpong: PooledBuffer;
      try {
        pingpong = pool.acquire(node.resolution, precision);
      } catch (e) {
        pool.release(primary);
        throw e;
      }
      result = renderPasses(this.context, filter, node, primary, pingpong, parents);
      this.evaluations++;
    }

    this.cache[index] = result;

    for (const parent of node.parents) {
      if (parent === null) continue;
      this.pending[parent]--;
      if (this.pending[parent] <= 0) this.releaseIntermediate(parent);
    }

    return result;
  }

  private releaseIntermediate(index: NodeIndex): void {
    const buffer = this.cache[index];
    if (!buffer || this.isRetained(index)) return;
    this.context.pool.release(buffer);
    this.cache[index] = null;
  }

  private isRetained(index: NodeIndex): boolean {
    return this.external[index]
      || this.scope.nodes[index].persist
      || this.pinned.has(index)
      || this.requested.has(index);
  }

  /** After a failed request: give back everything that only existed for it. */
  private discardIntermediates(): void {
    for (let i = 0; i < this.cache.length; i++) {
      const buffer = this.cache[i];
      if (!buffer || this.external[i] || this.pinned.has(i) || this.scope.nodes[i].persist) continue;
      this.context.pool.release(buffer);
      this.cache[i] = null;
    }
  }

  private drop(index: NodeIndex): void {
    const buffer = this.cache[index];
    if (!buffer || this.external[index]) return;

    const { pool } = this.context;
    if (this.pinned.has(index) || this.scope.nodes[index].persist) {
      pool.retire(buffer);
    }
    pool.release(buffer);
    this.cache[index] = null;
    this.pinned.delete(index);
  }

  private descendantsOf(index: NodeIndex): Set<NodeIndex> {
    const children: NodeIndex[][] = this.scope.nodes.map(() => []);
    this.scope.nodes.forEach((node, i) => {
      for (const parent of node.parents) {
        if (parent !== null) children[parent].push(i);
      }
    });

    const found = new Set<NodeIndex>([index]);
    const queue = [index];
    while (queue.length > 0) {
      const current = queue.pop();
      if (current === undefined) break;
      for (const child of children[current]) {
        if (found.has(child)) continue;
        found.add(child);
        queue.push(child);
      }
    }
    return found;
  }

  private assertIndex(index: NodeIndex): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.scope.nodes.length) {
      throw new RangeError(`Node index ${index} is outside 0-${this.scope.nodes.length - 1}`);
    }
  }
}
