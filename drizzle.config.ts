import { defineConfig } from "drizzle-kit";

import { loadConfig, loadDotenv } from "./src/config";

loadDotenv();

const { DATABASE_URL: databaseUrl } = loadConfig();

if (!databaseUrl) {
  throw new Error("DATABASE_URL is not set. Please add it to your environment (e.g. in a .env file).");
}

export default defineConfig({
  schema: "./src/db/schema.ts",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: {
    url: databaseUrl,
  },
  verbose: true,
  strict: true,
});
