import { errorMessage } from "../common/errors";
import { loadConfig } from "../configs/environment";
import { listGeminiModels } from "../services/geminiModels.service";
import { logger } from "../utils/logger";

// Manual check that GOOGLE_API_KEY works: lists the models it can reach.
async function checkModel() {
  const config = loadConfig();
  logger.info("✅ Gemini API configured, fetching available models...");

  const models = await listGeminiModels(config.gemini.apiKey);
  if (models.length === 0) {
    logger.warn("⚠️ No models found for this API key.");
    return;
  }

  models.forEach((model, index) => {
    logger.info(`${index + 1}. ${model.name}`);
    logger.info(`   Supported methods: ${model.supportedGenerationMethods.join(", ")}`);
  });

  const configured = models.some((model) => model.name === `models/${config.gemini.model}`);
  if (!configured) {
    logger.warn(`Configured model ${config.gemini.model} is not in the list`);
  }
  logger.info("✅ Model listing completed successfully.");
}

checkModel().catch((error) => {
  logger.error(`❌ Failed to list models: ${errorMessage(error)}`);
  process.exit(1);
});
