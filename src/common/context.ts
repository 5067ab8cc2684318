import type { AppConfig } from "../configs/environment";
import type { TextGenerator } from "../services/gemini.service";

/**
 * Process-wide collaborators built once at startup and handed to the routes.
 */
export interface AppContext {
  config: AppConfig;
  textGenerator: TextGenerator;
}
