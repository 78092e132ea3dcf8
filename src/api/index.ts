import { PgDatasetStore } from "../dataset/pgStore.js";
import { config } from "../lib/config.js";
import { ensureConnection, query } from "../lib/db.js";
import { logger } from "../lib/logger.js";
import { defaultAliasTable } from "../matching/aliases.js";
import { createMatcher } from "../matching/engine.js";
import { fetchListing } from "../scraper/propertyFinder.js";
import { createApp } from "./app.js";

async function main() {
  await ensureConnection();
  const store = new PgDatasetStore(query);
  const matcher = createMatcher({ store, fetchListing, aliases: defaultAliasTable() });
  const app = createApp({ matcher, store });
  app.listen(config.port, () => logger.info({ port: config.port }, "API listening"));
}

main().catch((err) => {
  logger.fatal({ err }, "API failed to start");
  process.exit(1);
});
