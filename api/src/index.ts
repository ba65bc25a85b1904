// api/src/index.ts
import { config } from "./config.js"; // <- прогревает env и config
import { createApp } from "./app.js";
import {
  createDbCatalogProvider,
  createStaticCatalogProvider,
  type CatalogProvider,
} from "./catalogProviders.js";
import type { FacilityRow } from "./types.js";

async function resolveCatalogProvider(): Promise<CatalogProvider> {
  if (config.catalogSource === "static") {
    return createStaticCatalogProvider();
  }
  // db.ts создаёт пул при импорте, поэтому грузим его только для db-источника
  const { q, ensureFacilitiesSchema } = await import("./db.js");
  await ensureFacilitiesSchema();
  return createDbCatalogProvider((text) => q<FacilityRow>(text));
}

async function main() {
  const catalogProvider = await resolveCatalogProvider();
  const app = createApp({ catalogProvider, corsOrigin: config.corsOrigin });

  app.listen(config.port, () => {
    console.log(`api:${config.port} (catalog: ${catalogProvider.name})`);
  });
}

main().catch((err) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
