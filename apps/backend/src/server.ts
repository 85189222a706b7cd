import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { createApp } from "./app.js";
import { createDefaultConfigProvider } from "./config/configProvider.js";
import { createLogger } from "./logger.js";
import { createProviderFactory } from "./providers/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: resolve(__dirname, "../../../.env") });
dotenv.config();

const logger = createLogger();
const port = Number(process.env.BACKEND_PORT || 4000);
const providers = createProviderFactory({ configProvider: createDefaultConfigProvider(process.env, logger), logger });
const app = createApp({ providers, logger });

app.listen(port, () => {
  logger.info({ port, provider: providers.name }, `Summarizer backend listening on http://localhost:${port}`);
});
