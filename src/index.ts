// src/index.ts
import { createApp, createServices } from "./app";
import { createDatabase } from "./db/drizzle";
import { loadEnv, type Env } from "./env";
import { FileGateway } from "./store/file";
import type { PersistenceGateway } from "./store/gateway";
import { MemoryGateway } from "./store/memory";
import { PostgresGateway } from "./store/postgres";

function openStore({ STORE }: Env): PersistenceGateway {
  switch (STORE.DRIVER) {
    case "memory":
      return new MemoryGateway();
    case "file":
      return new FileGateway(STORE.DATA_DIR, { retries: STORE.RETRIES, delayMs: STORE.RETRY_DELAY_MS });
    case "postgres": {
      if (!STORE.DATABASE_URL) throw new Error("DATABASE_URL is required when STORE_DRIVER=postgres");
      const { db, pool } = createDatabase(STORE.DATABASE_URL);
      return new PostgresGateway(db, pool);
    }
  }
}

const ENV = loadEnv();
const store = openStore(ENV);
const app = createApp(createServices(store));

app.listen(ENV.PORT, () => {
  console.log(`🚗 rentacar api on http://localhost:${ENV.PORT} (store: ${ENV.STORE.DRIVER})`);
});

process.on("SIGINT", async () => { await store.close(); process.exit(0); });
