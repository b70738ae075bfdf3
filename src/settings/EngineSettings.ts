export interface EngineSettings {
  // Graph limits
  maxNodes: number;            // Node array capacity, checked at load time
  maxSubroutineDepth: number;  // Nested subroutine calls allowed below the top-level graph

  // Pool
  maxPoolBytes: number;        // 0 = unlimited. Retired idle buffers are evicted to stay under it

  // Rendering
  generateMips: boolean;       // Rebuild summary levels after every pass
  fallbackGray: number;        // 0-1, value of the buffer substituted for failed auxiliary data

  // Diagnostics
  debug: boolean;              // Trace node evaluation via console.debug
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  maxNodes: 512,
  maxSubroutineDepth: 8,
  maxPoolBytes: 0,
  generateMips: true,
  fallbackGray: 0.5,
  debug: false,
};

/** Hard ceiling for maxNodes: parent links are stored as uint16 with 0xFFFF reserved. */
export const NODE_INDEX_LIMIT = 0xffff;

/**
 * Merge loaded data with defaults, ensuring all fields exist and are in range.
 */
export function mergeEngineSettings(loaded: Partial<EngineSettings> | null): EngineSettings {
  if (!loaded) return { ...DEFAULT_ENGINE_SETTINGS };
  const merged: EngineSettings = { ...DEFAULT_ENGINE_SETTINGS, ...loaded };

  merged.maxNodes = clampInt(merged.maxNodes, 1, NODE_INDEX_LIMIT, DEFAULT_ENGINE_SETTINGS.maxNodes);
  merged.maxSubroutineDepth = clampInt(merged.maxSubroutineDepth, 0, 64, DEFAULT_ENGINE_SETTINGS.maxSubroutineDepth);
  merged.maxPoolBytes = Number.isFinite(merged.maxPoolBytes) && merged.maxPoolBytes > 0
    ? Math.floor(merged.maxPoolBytes)
    : 0;
  merged.fallbackGray = Number.isFinite(merged.fallbackGray)
    ? Math.max(0, Math.min(1, merged.fallbackGray))
    : DEFAULT_ENGINE_SETTINGS.fallbackGray;
  if (typeof merged.generateMips !== "boolean") merged.generateMips = DEFAULT_ENGINE_SETTINGS.generateMips;
  if (typeof merged.debug !== "boolean") merged.debug = DEFAULT_ENGINE_SETTINGS.debug;

  return merged;
}

/**
 * Parse settings from a JSON string. Invalid JSON yields the defaults.
 */
export function parseEngineSettings(raw: string | null): EngineSettings {
  if (!raw) return { ...DEFAULT_ENGINE_SETTINGS };

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null) return { ...DEFAULT_ENGINE_SETTINGS };
    return mergeEngineSettings(parsed as Partial<EngineSettings>);
  } catch (e) {
    console.warn("[EngineSettings] Ignoring unreadable settings:", e);
    return { ...DEFAULT_ENGINE_SETTINGS };
  }
}

function clampInt(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(value)));
}
