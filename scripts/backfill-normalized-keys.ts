import process from "node:process";

import { asc, eq } from "drizzle-orm";

import { loadConfig, loadDotenv } from "@/config";
import { createDb } from "@/db";
import { catalogEntities } from "@/db/schema";
import { planKeyBackfill } from "@/catalog/maintenance";

loadDotenv();

async function main() {
  const dryRun = process.argv.includes("--dry-run");
  const { db, close } = createDb(loadConfig().DATABASE_URL);

  try {
    console.log("\n🔧 Catalog - normalized key backfill");
    console.log("═".repeat(60));
    if (dryRun) {
      console.info("DRY RUN MODE - No data will be modified\n");
    }

    const entities = await db
      .select({
        id: catalogEntities.id,
        displayName: catalogEntities.displayName,
        normalizedKey: catalogEntities.normalizedKey,
      })
      .from(catalogEntities)
      .orderBy(asc(catalogEntities.id));

    const plan = planKeyBackfill(entities);
    console.log(`Entities checked: ${entities.length.toLocaleString()}`);
    console.log(`Keys to update:   ${plan.updates.length.toLocaleString()}`);
    console.log(`Collisions:       ${plan.collisions.length.toLocaleString()}\n`);

    for (const collision of plan.collisions) {
      console.warn(
        `  ⚠️  #${collision.id} "${collision.displayName}" -> "${collision.normalizedKey}" already used by #${collision.conflictsWith}`
      );
    }

    if (dryRun) return;

    let updated = 0;
    for (const update of plan.updates) {
      await db
        .update(catalogEntities)
        .set({ normalizedKey: update.normalizedKey })
        .where(eq(catalogEntities.id, update.id));
      updated++;
      if (updated % 100 === 0) {
        console.log(`  Progress: ${updated}/${plan.updates.length}`);
      }
    }
    console.log(`✅ Updated ${updated.toLocaleString()} key(s)`);
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  console.error("✖ Backfill failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
