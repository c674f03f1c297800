/**
 * Reader for package catalog files.
 *
 * A catalog is `{ "packages": [...] }`; each entry lists its versions newest
 * first and optionally which one is installed.
 */

import { z } from 'zod';
import { CatalogError } from '../errors';
import type { PackageInfo, PackageVersion } from '../types/package';
import { readJsonFile } from './helpers';

const catalogVersionSchema = z.union([
  z.string().min(1),
  z.object({
    version: z.string().min(1),
    releasedAt: z.string().optional(),
  }),
]);

const catalogPackageSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  source: z.enum(['registry', 'store', 'builtin']).default('registry'),
  description: z.string().default(''),
  versions: z.array(catalogVersionSchema).min(1),
  installed: z.string().optional(),
});

const catalogSchema = z.object({
  packages: z.array(catalogPackageSchema),
});

export type CatalogPackage = z.infer<typeof catalogPackageSchema>;

export function versionId(name: string, version: string): string {
  return `${name}@${version}`;
}

/** Map a validated catalog entry to the package model. */
export function toPackageInfo(entry: CatalogPackage): PackageInfo {
  const versions: PackageVersion[] = entry.versions.map(v => {
    const version = typeof v === 'string' ? v : v.version;
    return {
      uniqueId: versionId(entry.name, version),
      packageUniqueId: entry.name,
      version,
      isInstalled: version === entry.installed,
      releasedAt: typeof v === 'string' ? undefined : v.releasedAt,
    };
  });
  const installed = versions.find(v => v.isInstalled);
  return {
    uniqueId: entry.name,
    name: entry.name,
    displayName: entry.displayName ?? entry.name,
    source: entry.source,
    description: entry.description,
    versions,
    installedVersionId: installed?.uniqueId,
    progress: 'none',
    errors: installed || entry.installed === undefined
      ? []
      : [`Installed version ${entry.installed} is not in the catalog`],
  };
}

/** Validate parsed JSON as a catalog. Duplicate package names are rejected. */
export function parseCatalog(value: unknown, origin = 'catalog'): PackageInfo[] {
  const parsed = catalogSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogError(`Invalid catalog ${origin}: ${detail}`, 'CATALOG_INVALID', { origin });
  }

  const seen = new Set<string>();
  for (const entry of parsed.data.packages) {
    if (seen.has(entry.name)) {
      throw new CatalogError(`Invalid catalog ${origin}: duplicate package "${entry.name}"`, 'CATALOG_INVALID', { origin, name: entry.name });
    }
    seen.add(entry.name);
  }
  return parsed.data.packages.map(toPackageInfo);
}

export async function readCatalog(filePath: string): Promise<PackageInfo[]> {
  const read = await readJsonFile(filePath);
  if (!read.ok) {
    if (read.reason === 'malformed') {
      throw new CatalogError(`Catalog ${filePath} is not valid JSON`, 'CATALOG_INVALID', { filePath });
    }
    throw new CatalogError(`Cannot read catalog ${filePath}`, 'CATALOG_READ_ERROR', { filePath, reason: read.reason });
  }
  return parseCatalog(read.value, filePath);
}
