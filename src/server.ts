import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { openStore } from "./lib/storage.js";

const config = loadConfig();
const store = await openStore(config);
const app = createApp({ store, jsonLimit: config.jsonLimit });

const server = app.listen(config.port, () => {
  console.log(`designer-growth-api running on http://localhost:${config.port}`);
});

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  console.log(`${signal} received, shutting down`);
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await store?.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  });
}
