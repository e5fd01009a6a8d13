export interface Config {
  port: number;
  databaseUrl?: string; // MongoDB connection string
  databaseName: string;
  dataDir?: string; // JSON-file store, used when no databaseUrl is set
  jsonLimit: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = Number(env.PORT || "8000");
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    databaseUrl: env.DATABASE_URL || undefined,
    databaseName: env.DATABASE_NAME || "designer_growth",
    dataDir: env.DATA_DIR || undefined,
    jsonLimit: env.JSON_LIMIT || "1mb"
  };
}
