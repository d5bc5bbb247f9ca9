/**
 * Re-export shared logger configured for the github-api service
 */
import { createLogger } from "@founder-finder/utils";

const logger = createLogger("github-api");

export default logger;
