import "dotenv/config";
import { createServices } from "../src/bootstrap.js";
import { loadConfig, requireNotionConfig } from "../src/config/env.js";

async function main() {
  const config = loadConfig();
  const notion = requireNotionConfig(config);

  if (config.storeBackend === "memory") {
    console.warn(
      "[ingest] STORE_BACKEND=memory: chunks are discarded when this process exits. Use postgres to keep them.",
    );
  }

  const { services, close } = await createServices(config);
  try {
    if (!services.documentSource) {
      throw new Error("Notion document source is not configured.");
    }

    console.log(`[ingest] Fetching documents from Notion database: ${notion.databaseId}`);
    const startedAt = Date.now();
    const result = await services.ingestor.ingestAll(services.documentSource);

    console.log(
      `[ingest] Done in ${((Date.now() - startedAt) / 1000).toFixed(1)}s: ` +
        `${result.processed} processed, ${result.skipped} skipped, ` +
        `${result.failed.length} failed, ${result.chunkCount} chunks stored.`,
    );
    for (const failure of result.failed) {
      console.log(`  - ${failure.id}: ${failure.reason}`);
    }
    if (result.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error("Ingestion failed:", error);
  process.exit(1);
});
