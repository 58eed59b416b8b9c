import { defineConfig } from "drizzle-kit";
import "dotenv/config";
import { loadConfig } from "./src/config";

const { databaseUrl } = loadConfig();

if (!databaseUrl) {
  throw new Error(
    "Missing database connection string. Set POSTGRES_URL_NON_POOLING, POSTGRES_URL, or DATABASE_URL."
  );
}

export default defineConfig({
  dialect: "postgresql",
  schema: "./drizzle/schema.ts",
  out: "./drizzle/migrations",
  dbCredentials: {
    url: databaseUrl,
  },
  strict: true,
});
