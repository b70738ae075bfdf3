/**
 * Reuse-oriented allocator for render targets.
 *
 * Buffers are keyed by (packed resolution, precision). Released buffers stay
 * allocated for the next matching acquire; nothing shrinks on its own. A buffer
 * can be retired when an external consumer may still sample it: it is never
 * handed out again and is destroyed by collect(), or evicted oldest-first when
 * a memory budget is set and a new allocation would exceed it.
 */

import type { PrecisionMode } from "../types";
import type { RenderDevice, RenderTarget } from "../render/RenderDevice";
import { targetByteSize } from "../render/RenderDevice";
import { decodeResolution, resolutionKey } from "../graph/Resolution";
import { ResourceExhaustedError } from "../engine/EngineErrors";

export interface PooledBuffer {
  readonly id: number;
  readonly resolution: number;
  readonly width: number;
  readonly height: number;
  readonly precision: PrecisionMode;
  readonly target: RenderTarget;
  readonly inUse: boolean;
  readonly retired: boolean;
}

export interface PoolStats {
  buffers: number;
  inUse: number;
  retired: number;
  bytes: number;
}

interface PoolEntry extends PooledBuffer {
  inUse: boolean;
  retired: boolean;
  bytes: number;
  lastUsed: number;
}

export class ResourcePool {
  private device: RenderDevice;
  private entries: PoolEntry[] = [];
  private totalBytes = 0;
  private maxBytes: number;
  private clock = 0;

  /** @param maxBytes budget for all pooled buffers, 0 = unlimited */
  constructor(device: RenderDevice, maxBytes = 0) {
    this.device = device;
    this.maxBytes = maxBytes;
  }

  /**
   * Hand out an idle, non-retired buffer of the requested kind, allocating a new
   * one when none is free.
   */
  acquire(resolution: number, precision: PrecisionMode): PooledBuffer {
    for (const entry of this.entries) {
      if (!entry.inUse && !entry.retired && entry.resolution === resolution && entry.precision === precision) {
        entry.inUse = true;
        entry.lastUsed = ++this.clock;
        return entry;
      }
    }

    const { width, height } = decodeResolution(resolution);
    const bytes = targetByteSize(width, height, precision);
    this.reserve(bytes, resolution, precision);

    const target = this.device.createTarget(width, height, precision);
    const entry: PoolEntry = {
      id: target.id,
      resolution,
      width,
      height,
      precision,
      target,
      inUse: true,
      retired: false,
      bytes,
      lastUsed: ++this.clock,
    };
    this.entries.push(entry);
    this.totalBytes += bytes;
    return entry;
  }

  /** Return a buffer for reuse. It stays allocated. */
  release(handle: PooledBuffer): void {
    const entry = this.find(handle);
    if (!entry) {
      console.warn(`[ResourcePool] release of unknown buffer ${handle.id}`);
      return;
    }
    if (!entry.inUse) {
      console.warn(`[ResourcePool] buffer ${handle.id} released twice`);
      return;
    }
    entry.inUse = false;
    entry.lastUsed = ++this.clock;
  }

  /** Exclude a buffer from reuse. It is destroyed by collect() once idle. */
  retire(handle: PooledBuffer): void {
    const entry = this.find(handle);
    if (entry) entry.retired = true;
  }

  /** Destroy every retired buffer that is no longer in use. Returns how many were freed. */
  collect(): number {
    let freed = 0;
    for (const entry of [...this.entries]) {
      if (entry.retired && !entry.inUse) {
        this.destroy(entry);
        freed++;
      }
    }
    return freed;
  }

  /** Destroy every buffer, in use or not. */
  dispose(): void {
    for (const entry of [...this.entries]) this.destroy(entry);
  }

  stats(): PoolStats {
    let inUse = 0;
    let retired = 0;
    for (const entry of this.entries) {
      if (entry.inUse) inUse++;
      if (entry.retired) retired++;
    }
    return { buffers: this.entries.length, inUse, retired, bytes: this.totalBytes };
  }

  get memoryUsage(): number { return this.totalBytes; }
  get size(): number { return this.entries.length; }

  /**
   * Make room for a new allocation under the budget by evicting retired idle
   * buffers, least recently used first.
   */
  private reserve(bytes: number, resolution: number, precision: PrecisionMode): void {
    if (this.maxBytes <= 0) return;

    while (this.totalBytes + bytes > this.maxBytes) {
      let oldest: PoolEntry | null = null;
      for (const entry of this.entries) {
        if (!entry.retired || entry.inUse) continue;
        if (!oldest || entry.lastUsed < oldest.lastUsed) oldest = entry;
      }
      if (!oldest) {
        throw new ResourceExhaustedError(
          `ResourcePool: ${resolutionKey(resolution)} ${precision} buffer needs ${bytes} bytes, ` +
          `${this.totalBytes} of ${this.maxBytes} in use`,
          bytes,
        );
      }
      this.destroy(oldest);
    }
  }

  private destroy(entry: PoolEntry): void {
    this.device.destroyTarget(entry.target);
    this.entries.splice(this.entries.indexOf(entry), 1);
    this.totalBytes -= entry.bytes;
  }

  private find(handle: PooledBuffer): PoolEntry | undefined {
    return this.entries.find((entry) => entry === handle);
  }
}
