import type { Server } from "http";
import type { AppContext } from "./common/context";
import { loadConfig } from "./configs/environment";
import { createServer } from "./server";
import { GeminiTextGenerator } from "./services/gemini.service";
import { logger } from "./utils/logger";
import { SERVICE_INFO } from "./utils/constants";

class DietPlanApplication {
  private context: AppContext | null = null;

  /**
   * Validate configuration and build the Gemini client. Throws ConfigError
   * when GOOGLE_API_KEY is missing.
   */
  initialize(): AppContext {
    logger.info(`Starting ${SERVICE_INFO.NAME} v${SERVICE_INFO.VERSION} ...`);
    const config = loadConfig();
    this.context = {
      config,
      textGenerator: new GeminiTextGenerator(config.gemini),
    };
    logger.info("Google Gemini API configured successfully");
    return this.context;
  }

  start(): Server {
    const context = this.context ?? this.initialize();
    const { port, host } = context.config;
    const app = createServer(context);
    return app.listen(port, host, () => logger.info(`Diet plan service listening on ${host}:${port}`));
  }
}

function main() {
  const application = new DietPlanApplication();
  try {
    application.start();
  } catch (error) {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}

export { DietPlanApplication, main };
