export { parseCsv, csvEscape, formatCsvRow } from "./csv.js";
export type { CsvRecord } from "./csv.js";
export {
  ManifestLoader,
  loadManifest,
  parseManifest,
  manifestKey,
  resolveManifestPath,
  MANIFEST_EXTENSION,
} from "./loader.js";
export type { Manifest, ManifestEntry } from "./loader.js";
