// api/scripts/seedFacilities.ts
// Заполняет таблицу facilities встроенным каталогом, если она пустая.

import { closePool, ensureFacilitiesSchema, q, withTransaction } from "../src/db.js";
import { STATIC_FACILITY_CATALOG, toFacility } from "../src/facilityCatalog.js";

async function main() {
  await ensureFacilitiesSchema();

  const [{ count }] = await q<{ count: string }>(`SELECT count(*)::text AS count FROM facilities`);
  if (Number(count) > 0) {
    console.log(`facilities already has ${count} rows, skipping seed`);
    return;
  }

  await withTransaction(async () => {
    for (const entry of STATIC_FACILITY_CATALOG) {
      const f = toFacility(entry);
      await q(`INSERT INTO facilities (name, cohort_range) VALUES ($1, $2)`, [
        f.name,
        `${f.lowInclusive}-${f.highExclusive}`,
      ]);
    }
  });
  console.log(`✅ seeded ${STATIC_FACILITY_CATALOG.length} facilities`);
}

main()
  .catch((err) => {
    console.error("Seed failed:", err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
