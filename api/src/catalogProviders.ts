// api/src/catalogProviders.ts
import { STATIC_FACILITY_CATALOG } from "./facilityCatalog.js";
import { CatalogUnavailableError } from "./middleware/errorHandler.js";
import type { CatalogEntry, FacilityRow } from "./types.js";

export interface CatalogProvider {
  readonly name: string;
  fetchEntries(): Promise<CatalogEntry[]>;
}

export type FacilityQuery = (text: string) => Promise<FacilityRow[]>;

export const FACILITIES_SQL = `SELECT name, cohort_range FROM facilities ORDER BY id`;

export function createStaticCatalogProvider(
  entries: readonly CatalogEntry[] = STATIC_FACILITY_CATALOG
): CatalogProvider {
  return {
    name: "static",
    async fetchEntries() {
      return [...entries];
    },
  };
}

/** Каталог из таблицы facilities; любая ошибка чтения -> CatalogUnavailableError. */
export function createDbCatalogProvider(query: FacilityQuery): CatalogProvider {
  return {
    name: "db",
    async fetchEntries() {
      let rows: FacilityRow[];
      try {
        rows = await query(FACILITIES_SQL);
      } catch (err) {
        throw new CatalogUnavailableError("db", err instanceof Error ? err.message : String(err));
      }
      return rows.map((row): CatalogEntry => ({ kind: "text", name: row.name, range: row.cohort_range }));
    },
  };
}
