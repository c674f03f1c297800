import { fileURLToPath } from 'url';

/** Catalog shipped with the CLI, used when no other catalog is configured. */
export const SAMPLE_CATALOG_PATH = fileURLToPath(new URL('../catalogs/sample.json', import.meta.url));
