import "dotenv/config";
import { mkdirSync } from "fs";
import { createApp } from "./app.js";
import { loadSettings } from "./config.js";
import { createAppContext } from "./services/context.js";
import { logger } from "./services/logger.js";

const settings = loadSettings();

mkdirSync(settings.outputDir, { recursive: true });

if (!settings.googleApiKey) {
  logger.warn("GOOGLE_API_KEY is not set. Attribute extraction and image search will be degraded.");
}
if (!settings.googleCseId) {
  logger.warn("GOOGLE_CSE_ID is not set. Image search will not work.");
}

const app = createApp(createAppContext(settings));

app.listen(settings.port, settings.host, () => {
  logger.info({ host: settings.host, port: settings.port }, "Attribute enrichment API listening");
});
