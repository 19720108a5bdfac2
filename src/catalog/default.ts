import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { CatalogError } from "../errors.js";
import { CatalogFileSchema, parseOrThrow } from "../schemas.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../catalogs/default.json", import.meta.url));

/** Load an ordered list of catalog entries from a JSON file. */
export async function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<string[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new CatalogError("CATALOG_UNREADABLE", `Cannot read catalog "${path}": ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return parseOrThrow(CatalogFileSchema, raw, `catalog "${path}"`);
}
