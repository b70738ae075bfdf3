import type { EngineSettings } from "../settings/EngineSettings";
import type { RenderDevice } from "../render/RenderDevice";
import type { AuxiliaryDataProvider, TextRasterizer } from "../auxiliary/AuxiliaryDataProvider";
import { mergeEngineSettings } from "../settings/EngineSettings";
import { CpuRenderDevice } from "../render/CpuRenderDevice";
import { FilterRegistry } from "../filters/FilterRegistry";
import { registerBuiltinFilters } from "../filters/builtin";
import { ResourcePool } from "../pool/ResourcePool";
import { DefaultAuxiliaryProvider } from "../auxiliary/AuxiliaryDataProvider";
import { decodePackage, deserializePackage } from "../graph/PackageSerializer";
import { TextureGenerator } from "./TextureGenerator";

/**
 * Everything evaluation sessions share: one device, one pool on top of it,
 * the filter table and the auxiliary provider.
 */
export interface TextureContext {
  readonly device: RenderDevice;
  readonly pool: ResourcePool;
  readonly registry: FilterRegistry;
  readonly auxiliary: AuxiliaryDataProvider;
  readonly settings: EngineSettings;
}

export interface TextureContextOptions {
  device?: RenderDevice;
  /** Defaults to a registry holding the built-in filters. */
  registry?: FilterRegistry;
  settings?: Partial<EngineSettings> | null;
  auxiliary?: AuxiliaryDataProvider;
  /** Used by the default auxiliary provider for text nodes. */
  textRasterizer?: TextRasterizer | null;
}

export function createTextureContext(options: TextureContextOptions = {}): TextureContext {
  const settings = mergeEngineSettings(options.settings ?? null);
  const device = options.device ?? new CpuRenderDevice();

  let registry = options.registry;
  if (!registry) {
    registry = new FilterRegistry();
    registerBuiltinFilters(registry);
  }

  const auxiliary = options.auxiliary ?? new DefaultAuxiliaryProvider(device, {
    fallbackGray: settings.fallbackGray,
    textRasterizer: options.textRasterizer ?? null,
  });

  return {
    device,
    pool: new ResourcePool(device, settings.maxPoolBytes),
    registry,
    auxiliary,
    settings,
  };
}

/** Destroy every pooled and cached buffer the context owns. */
export function disposeTextureContext(context: TextureContext): void {
  context.auxiliary.dispose();
  context.pool.dispose();
}

/**
 * Decode a package and open a validated session on it.
 * Strings are the compressed Base64 form, byte arrays the raw binary form.
 */
export function loadPackage(context: TextureContext, data: Uint8Array | string): TextureGenerator {
  const pkg = typeof data === "string" ? deserializePackage(data) : decodePackage(data);
  return new TextureGenerator(context, pkg);
}
