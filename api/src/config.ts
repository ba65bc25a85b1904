// api/src/config.ts
import dotenv from "dotenv";
dotenv.config();

type NodeEnv = "development" | "production" | "test";
type CatalogSource = "db" | "static";

export interface Config {
  port: number;
  databaseUrl?: string;
  catalogSource: CatalogSource;
  corsOrigin: string[];
  nodeEnv: NodeEnv;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === "production" || value === "test") return value;
  return "development";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = env.DATABASE_URL || undefined;

  const source = env.CATALOG_SOURCE || (databaseUrl ? "db" : "static");
  if (source !== "db" && source !== "static") {
    throw new Error(`CATALOG_SOURCE must be "db" or "static", got "${source}"`);
  }
  if (source === "db" && !databaseUrl) {
    throw new Error("DATABASE_URL must be set when CATALOG_SOURCE=db");
  }

  const rawPort = env.PORT || "8080";
  const port = Number(rawPort);
  if (!/^\d+$/.test(rawPort) || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    databaseUrl,
    catalogSource: source,
    corsOrigin: (env.CORS_ORIGIN || "http://localhost:5173").split(",").map((s) => s.trim()),
    nodeEnv: parseNodeEnv(env.NODE_ENV),
  };
}

export const config = loadConfig();
