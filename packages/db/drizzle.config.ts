/// <reference types="node" />
import { defineConfig } from "drizzle-kit";

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error("DATABASE_URL is required to run drizzle-kit");
}

export default defineConfig({
  dialect: "postgresql",
  // Explicit file list: drizzle-kit loads schemas as CJS and can't follow the
  // .js extension imports in schema/index.ts.
  schema: ["./src/schema/transactions.ts"],
  out: "./drizzle",
  dbCredentials: { url },
});
