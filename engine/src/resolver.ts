/**
 * texnames Engine — Package Resolver
 *
 * Keeps the catalog packages that have a loadable .sty file and records
 * the stem an editor has to insert for them.
 */

import { fileStem } from "./lsr";
import type { CatalogTable, CompletionTable, PackageFileMap } from "./types";

/**
 * Find the .sty stem for a catalog package.
 *
 * An exact "<name>.sty" anywhere in the index wins. Otherwise the files
 * attributed to the package are searched, first exactly, then ignoring
 * case (Foo.sty for package "foo").
 */
export function resolvePackageCommand(
  name: string,
  packageFiles: PackageFileMap,
  allFiles: ReadonlySet<string>,
): string | undefined {
  const styName = `${name}.sty`;
  if (allFiles.has(styName)) return name;

  const files = packageFiles.get(name);
  if (!files) return undefined;
  if (files.includes(styName)) return name;

  const folded = styName.toLowerCase();
  const match = files.find((file) => file.toLowerCase() === folded);
  return match === undefined ? undefined : fileStem(match);
}

export function resolvePackages(
  catalog: CatalogTable,
  packageFiles: PackageFileMap,
  allFiles: readonly string[],
): CompletionTable {
  const known = new Set(allFiles);
  const packages: CompletionTable = new Map();

  for (const [name, entry] of catalog) {
    const command = resolvePackageCommand(name, packageFiles, known);
    if (command !== undefined) {
      packages.set(name, { ...entry, command });
    }
  }

  return packages;
}
