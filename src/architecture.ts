import type { ArchitectureLayer, ArchitectureMap, FileDescriptor } from "./types.js";

// Checked in order; the first layer with a matching marker wins.
const LAYER_MARKERS: ReadonlyArray<readonly [ArchitectureLayer, readonly string[]]> = [
  ["api", ["api/", "routes/", "endpoints/", "handlers/"]],
  ["services", ["service", "business", "logic", "core/"]],
  ["models", ["model", "schema", "entity", "database", "db/"]],
  ["components", ["component", "ui/", "views/", "pages/"]],
  ["utils", ["util", "helper", "lib/", "common/"]],
  ["config", ["config", "setting", "env"]],
];

/** Layer suggested by path substrings, case-insensitive; null when none match. */
export function classifyLayer(relPath: string): ArchitectureLayer | null {
  const normalized = relPath.toLowerCase().replace(/\\/g, "/");
  for (const [layer, markers] of LAYER_MARKERS) {
    if (markers.some((marker) => normalized.includes(marker))) return layer;
  }
  return null;
}

/** Scanned files grouped by layer, in scan order; unclassified files are left out. */
export function classifyArchitecture(files: Iterable<FileDescriptor>): ArchitectureMap {
  const layers: ArchitectureMap = {
    api: [],
    services: [],
    models: [],
    components: [],
    utils: [],
    config: [],
  };
  for (const file of files) {
    const layer = classifyLayer(file.relativePath);
    if (layer) layers[layer].push(file.relativePath);
  }
  return layers;
}
