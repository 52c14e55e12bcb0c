import process from "node:process";

import { asc } from "drizzle-orm";

import { loadConfig, loadDotenv } from "@/config";
import { createDb } from "@/db";
import { catalogEntities } from "@/db/schema";
import { findNormalizedDuplicates } from "@/catalog/maintenance";

loadDotenv();

async function main() {
  const { db, close } = createDb(loadConfig().DATABASE_URL);

  try {
    console.log("\n🔍 Catalog - normalized name duplicates");
    console.log("═".repeat(60));

    const entities = await db
      .select({
        id: catalogEntities.id,
        displayName: catalogEntities.displayName,
        normalizedKey: catalogEntities.normalizedKey,
      })
      .from(catalogEntities)
      .orderBy(asc(catalogEntities.id));
    console.log(`Checked ${entities.length.toLocaleString()} catalog entities\n`);

    const groups = findNormalizedDuplicates(entities);
    if (groups.length === 0) {
      console.log("✅ No duplicates found");
      return;
    }

    for (const group of groups) {
      console.log(`"${group.normalizedKey}"`);
      for (const entity of group.entities) {
        console.log(`   #${entity.id}  ${entity.displayName}  (stored key: ${entity.normalizedKey})`);
      }
    }
    console.log(`\n⚠️  ${groups.length} normalized name(s) shared by more than one entity`);
    process.exitCode = 1;
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  console.error("✖ Duplicate check failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
